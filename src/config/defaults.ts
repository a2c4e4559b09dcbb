/**
 * Default configuration values.
 */

import type {
  LedgerConfig,
  LocalBackendConfig,
  OutputConfig,
} from "../types/index.js";

/**
 * Default state file path (or object key).
 */
export const DEFAULT_STATE_FILE = "state.json";

/**
 * Bucket used when switching to s3 without naming one.
 */
export const DEFAULT_BUCKET = "stage-ledger-state";

/**
 * Config file looked up in the working directory when none is given.
 */
export const DEFAULT_CONFIG_FILE = "stage-ledger.yaml";

/**
 * Default backend configuration.
 */
export const DEFAULT_BACKEND: LocalBackendConfig = {
  type: "local",
  state_file: DEFAULT_STATE_FILE,
};

/**
 * Default output configuration.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  format: "text",
};

/**
 * Create a default configuration.
 *
 * @returns Configuration using the local backend
 */
export function createDefaultConfig(): LedgerConfig {
  return {
    backend: { ...DEFAULT_BACKEND },
    output: { ...DEFAULT_OUTPUT },
    verbose: false,
    debug: false,
  };
}
