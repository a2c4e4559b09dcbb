/**
 * Configuration module exports.
 */

export {
  loadConfig,
  loadConfigWithOverrides,
  validateConfig,
  ConfigLoadError,
  ConfigValidationError,
  type CLIOptions,
} from "./loader.js";

export {
  LedgerConfigSchema,
  BackendConfigSchema,
  LocalBackendConfigSchema,
  S3BackendConfigSchema,
  OutputConfigSchema,
} from "./schema.js";

export {
  createDefaultConfig,
  DEFAULT_BACKEND,
  DEFAULT_OUTPUT,
  DEFAULT_BUCKET,
  DEFAULT_CONFIG_FILE,
  DEFAULT_STATE_FILE,
} from "./defaults.js";
