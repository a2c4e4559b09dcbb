/**
 * Ledger error taxonomy.
 *
 * Callers branch on `code` to tell a corrupt document apart from an
 * unreachable backend.
 */

/**
 * Error codes raised by the ledger.
 */
export type LedgerErrorCode =
  | "MALFORMED_DOCUMENT"
  | "NOT_FOUND"
  | "BACKEND_UNAVAILABLE"
  | "INVALID_STAGE";

/**
 * Base class for all ledger errors.
 */
export class LedgerError extends Error {
  override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: LedgerErrorCode,
    cause?: Error,
  ) {
    super(message);
    this.name = "LedgerError";
    this.cause = cause;
  }
}

/**
 * Persisted bytes do not match the state document schema.
 */
export class MalformedDocumentError extends LedgerError {
  constructor(message: string, cause?: Error) {
    super(message, "MALFORMED_DOCUMENT", cause);
    this.name = "MalformedDocumentError";
  }
}

/**
 * The state document does not exist at the given location.
 */
export class DocumentNotFoundError extends LedgerError {
  constructor(
    public readonly location: string,
    cause?: Error,
  ) {
    super(`State document not found: ${location}`, "NOT_FOUND", cause);
    this.name = "DocumentNotFoundError";
  }
}

/**
 * I/O, network or authorization failure talking to a backend.
 */
export class BackendUnavailableError extends LedgerError {
  constructor(message: string, cause?: Error) {
    super(message, "BACKEND_UNAVAILABLE", cause);
    this.name = "BackendUnavailableError";
  }
}

/**
 * Stage name rejected before reaching the backend.
 */
export class InvalidStageNameError extends LedgerError {
  constructor(stage: string) {
    super(
      `Invalid stage name: ${JSON.stringify(stage)} (must be a non-empty string)`,
      "INVALID_STAGE",
    );
    this.name = "InvalidStageNameError";
  }
}

/**
 * Check whether a value is a ledger error.
 *
 * @param error - Value to check
 * @returns True for any LedgerError subclass
 */
export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}

/**
 * Map an error to a process exit code.
 *
 * - 2: malformed document
 * - 3: backend unavailable
 * - 1: anything else
 *
 * @param error - Error raised by a command
 * @returns Exit code
 */
export function exitCodeFor(error: unknown): number {
  if (!isLedgerError(error)) {
    return 1;
  }

  switch (error.code) {
    case "MALFORMED_DOCUMENT":
      return 2;
    case "BACKEND_UNAVAILABLE":
      return 3;
    case "NOT_FOUND":
    case "INVALID_STAGE":
      return 1;
  }
}

/**
 * Normalize an unknown thrown value into an Error for use as a cause.
 *
 * @param error - Thrown value
 * @returns The value itself if it is an Error, otherwise a wrapping Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
