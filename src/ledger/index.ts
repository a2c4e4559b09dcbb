/**
 * Ledger document and error exports.
 */

export {
  DOCUMENT_VERSION,
  UNSET,
  StageStatusSchema,
  isStageStatus,
  createEmptyDocument,
  lookupStage,
  encodeDocument,
  decodeDocument,
} from "./document.js";

export {
  LedgerError,
  MalformedDocumentError,
  DocumentNotFoundError,
  BackendUnavailableError,
  InvalidStageNameError,
  isLedgerError,
  exitCodeFor,
  toError,
  type LedgerErrorCode,
} from "./errors.js";
