/**
 * Backend interface for state document storage.
 */

import type { BackendKind } from "../types/index.js";

/**
 * Storage medium holding one state document per location.
 *
 * Only backends perform raw I/O on the document. Implementations report
 * failures as ledger errors:
 * - DocumentNotFoundError when the location is absent (read only)
 * - BackendUnavailableError for I/O, network or auth failures
 */
export interface StateBackend<TLocation> {
  readonly kind: BackendKind;

  /** Whether a document exists at the location */
  exists(location: TLocation): Promise<boolean>;

  /** Read the full document text */
  read(location: TLocation): Promise<string>;

  /** Replace the full document text */
  write(location: TLocation, content: string): Promise<void>;

  /** Human-readable form of the location, for logs */
  describe(location: TLocation): string;
}
