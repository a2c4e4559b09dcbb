/**
 * Zod validation schemas for configuration.
 */

import { z } from "zod";

/**
 * Local backend configuration schema.
 */
export const LocalBackendConfigSchema = z.object({
  type: z.literal("local"),
  state_file: z.string().min(1, "State file path is required"),
});

/**
 * S3 backend configuration schema.
 */
export const S3BackendConfigSchema = z.object({
  type: z.literal("s3"),
  bucket: z.string().min(1, "Bucket name is required"),
  state_file: z.string().min(1, "State object key is required"),
  region: z.string().min(1).optional(),
  endpoint: z.string().url().optional(),
  force_path_style: z.boolean().default(false),
});

/**
 * Backend configuration schema, keyed on `type`.
 */
export const BackendConfigSchema = z.discriminatedUnion("type", [
  LocalBackendConfigSchema,
  S3BackendConfigSchema,
]);

/**
 * Output format schema.
 */
const OutputFormatSchema = z.enum(["text", "json", "yaml"]);

/**
 * Output configuration schema.
 */
export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.default("text"),
});

/**
 * Complete ledger configuration schema.
 */
export const LedgerConfigSchema = z.object({
  backend: BackendConfigSchema.default({
    type: "local",
    state_file: "state.json",
  }),
  output: OutputConfigSchema.default({}),
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
});
