/**
 * Local filesystem backend.
 *
 * The location is a file path. Writes truncate and rewrite the whole file.
 * There is no locking; concurrent writers race and the last one wins.
 */

import {
  BackendUnavailableError,
  DocumentNotFoundError,
  toError,
} from "../ledger/errors.js";
import {
  createLogger,
  fileExists,
  fsErrorCode,
  readText,
  resolvePath,
  writeText,
} from "../utils/index.js";

import type { StateBackend } from "./backend.js";

const log = createLogger("local");

/**
 * File-based state backend.
 */
export class LocalBackend implements StateBackend<string> {
  readonly kind = "local" as const;

  async exists(location: string): Promise<boolean> {
    return fileExists(location);
  }

  async read(location: string): Promise<string> {
    let content: string;
    try {
      content = readText(location);
    } catch (err) {
      if (fsErrorCode(err) === "ENOENT") {
        throw new DocumentNotFoundError(location, toError(err));
      }
      const cause = toError(err);
      throw new BackendUnavailableError(
        `Failed to read state file ${location}: ${cause.message}`,
        cause,
      );
    }

    log.debug(`Read ${String(content.length)} bytes from ${location}`);
    return content;
  }

  async write(location: string, content: string): Promise<void> {
    try {
      writeText(location, content);
    } catch (err) {
      const cause = toError(err);
      throw new BackendUnavailableError(
        `Failed to write state file ${location}: ${cause.message}`,
        cause,
      );
    }

    log.debug(`Wrote ${String(content.length)} bytes to ${location}`);
  }

  describe(location: string): string {
    return resolvePath(location);
  }
}
