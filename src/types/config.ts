/**
 * Configuration type definitions.
 * Represents the stage-ledger.yaml configuration structure.
 */

/**
 * Supported backend kinds.
 */
export type BackendKind = "local" | "s3";

/**
 * Local filesystem backend configuration.
 */
export interface LocalBackendConfig {
  type: "local";
  /** Path to the state document */
  state_file: string;
}

/**
 * S3-compatible object storage backend configuration.
 */
export interface S3BackendConfig {
  type: "s3";
  bucket: string;
  /** Object key of the state document */
  state_file: string;
  region?: string | undefined;
  /** Custom endpoint for S3-compatible stores */
  endpoint?: string | undefined;
  force_path_style: boolean;
}

export type BackendConfig = LocalBackendConfig | S3BackendConfig;

/**
 * Output format for command results.
 */
export type OutputFormat = "text" | "json" | "yaml";

export interface OutputConfig {
  format: OutputFormat;
}

/**
 * Complete ledger configuration.
 */
export interface LedgerConfig {
  backend: BackendConfig;
  output: OutputConfig;
  verbose: boolean;
  debug: boolean;
}
