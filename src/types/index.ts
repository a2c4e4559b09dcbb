/**
 * Centralized type exports.
 */

// Ledger types
export type {
  StageStatus,
  StageLookup,
  StateDocument,
  StageResult,
  SetStageOptions,
} from "./ledger.js";

// Config types
export type {
  BackendKind,
  LocalBackendConfig,
  S3BackendConfig,
  BackendConfig,
  OutputFormat,
  OutputConfig,
  LedgerConfig,
} from "./config.js";
