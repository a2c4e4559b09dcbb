/**
 * Configuration loader with YAML/JSON support and Zod validation.
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { createDefaultConfig, DEFAULT_BUCKET } from "./defaults.js";
import { LedgerConfigSchema } from "./schema.js";

import type {
  BackendConfig,
  BackendKind,
  LedgerConfig,
  OutputFormat,
} from "../types/index.js";
import type { ZodError } from "zod";

/**
 * Configuration load error.
 */
export class ConfigLoadError extends Error {
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "ConfigLoadError";
    this.cause = cause;
  }
}

/**
 * Configuration validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError: ZodError,
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Load configuration from YAML or JSON file.
 *
 * @param configPath - Path to configuration file
 * @returns Validated configuration
 * @throws ConfigLoadError if file cannot be loaded
 * @throws ConfigValidationError if validation fails
 */
export function loadConfig(configPath: string): LedgerConfig {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigLoadError(`Configuration file not found: ${absolutePath}`);
  }

  let content: string;
  try {
    content = readFileSync(absolutePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  // YAML is a superset of JSON, but a .json file gets the stricter parser
  let rawConfig: unknown;
  const ext = path.extname(absolutePath).toLowerCase();

  try {
    rawConfig = ext === ".json" ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigLoadError(
      `Failed to parse configuration file: ${absolutePath}`,
      err instanceof Error ? err : undefined,
    );
  }

  // An empty YAML file parses to null
  return validateConfig(rawConfig ?? {});
}

/**
 * Validate raw configuration object.
 *
 * @param rawConfig - Raw configuration object
 * @returns Validated configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(rawConfig: unknown): LedgerConfig {
  const result = LedgerConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new ConfigValidationError(
      `Configuration validation failed:\n${issues}`,
      result.error,
    );
  }

  return result.data;
}

/**
 * CLI options that can override config.
 */
export interface CLIOptions {
  stateFile?: string;
  backend?: BackendKind;
  bucket?: string;
  region?: string;
  endpoint?: string;
  output?: OutputFormat;
  verbose?: boolean;
  debug?: boolean;
}

/**
 * Load configuration with CLI overrides.
 *
 * @param configPath - Path to configuration file (optional)
 * @param cliOptions - CLI option overrides
 * @returns Validated configuration
 */
export function loadConfigWithOverrides(
  configPath: string | undefined,
  cliOptions: Partial<CLIOptions>,
): LedgerConfig {
  const config = configPath ? loadConfig(configPath) : createDefaultConfig();

  // Re-validate so overridden values get the same checks as file values
  return validateConfig(applyOverrides(config, cliOptions));
}

/**
 * Resolve the backend configuration after CLI overrides.
 *
 * A bucket given on the command line selects the s3 backend unless a
 * backend is named explicitly.
 *
 * @param base - Backend from file or defaults
 * @param options - CLI options
 * @returns Backend configuration
 */
function resolveBackend(
  base: BackendConfig,
  options: Partial<CLIOptions>,
): BackendConfig {
  const kind: BackendKind =
    options.backend ?? (options.bucket ? "s3" : base.type);
  const stateFile = options.stateFile ?? base.state_file;

  if (kind === "local") {
    return { type: "local", state_file: stateFile };
  }

  const s3Base = base.type === "s3" ? base : undefined;
  return {
    type: "s3",
    bucket: options.bucket ?? s3Base?.bucket ?? DEFAULT_BUCKET,
    state_file: stateFile,
    region: options.region ?? s3Base?.region,
    endpoint: options.endpoint ?? s3Base?.endpoint,
    force_path_style: s3Base?.force_path_style ?? false,
  };
}

/**
 * Apply CLI overrides to configuration.
 *
 * @param config - Base configuration
 * @param options - CLI options
 * @returns Configuration with overrides applied
 */
function applyOverrides(
  config: LedgerConfig,
  options: Partial<CLIOptions>,
): LedgerConfig {
  const result: LedgerConfig = {
    ...config,
    backend: resolveBackend(config.backend, options),
  };

  if (options.output) {
    result.output = { ...result.output, format: options.output };
  }

  if (options.verbose !== undefined) {
    result.verbose = options.verbose;
  }

  if (options.debug !== undefined) {
    result.debug = options.debug;
  }

  return result;
}
