/**
 * In-memory state backend for store tests.
 *
 * Records every write so tests can assert that no-op calls do not touch
 * storage, and can be switched into failure modes.
 */

import {
  BackendUnavailableError,
  DocumentNotFoundError,
} from "../../src/ledger/errors.js";

import type { StateBackend } from "../../src/backends/backend.js";

export class MemoryBackend implements StateBackend<string> {
  readonly kind = "local" as const;

  /** Stored documents by location */
  readonly files = new Map<string, string>();

  /** Every write, in order */
  readonly writes: { location: string; content: string }[] = [];

  /** When set, every call rejects with BackendUnavailableError */
  unavailable = false;

  async exists(location: string): Promise<boolean> {
    this.checkAvailable();
    return this.files.has(location);
  }

  async read(location: string): Promise<string> {
    this.checkAvailable();
    const content = this.files.get(location);
    if (content === undefined) {
      throw new DocumentNotFoundError(location);
    }
    return content;
  }

  async write(location: string, content: string): Promise<void> {
    this.checkAvailable();
    this.files.set(location, content);
    this.writes.push({ location, content });
  }

  describe(location: string): string {
    return `memory:${location}`;
  }

  private checkAvailable(): void {
    if (this.unavailable) {
      throw new BackendUnavailableError("memory backend offline");
    }
  }
}
