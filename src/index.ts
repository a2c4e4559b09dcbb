#!/usr/bin/env node
/**
 * stage-ledger CLI entry point.
 *
 * CRITICAL: env.js must be the FIRST import to ensure
 * environment variables (AWS credentials, region) are loaded before any
 * other module.
 */
import "./env.js";

import { Command, InvalidArgumentError, Option } from "commander";

import { openStateStore } from "./backends/index.js";
import {
  ConfigLoadError,
  ConfigValidationError,
  DEFAULT_CONFIG_FILE,
  loadConfigWithOverrides,
  type CLIOptions,
} from "./config/index.js";
import { exitCodeFor, isStageStatus } from "./ledger/index.js";
import {
  formatDocument,
  formatStageResult,
  type StateStore,
} from "./state/index.js";
import { fileExists, logger } from "./utils/index.js";

import type { LedgerConfig, StageStatus } from "./types/index.js";

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract CLI options from commander's parsed options.
 *
 * @param options - Merged global and command options
 * @returns Typed CLI overrides
 */
function extractCLIOptions(options: Record<string, unknown>): CLIOptions {
  const cliOptions: CLIOptions = {};

  if (typeof options["stateFile"] === "string") {
    cliOptions.stateFile = options["stateFile"];
  }
  if (options["backend"] === "local" || options["backend"] === "s3") {
    cliOptions.backend = options["backend"];
  }
  if (typeof options["bucket"] === "string") {
    cliOptions.bucket = options["bucket"];
  }
  if (typeof options["region"] === "string") {
    cliOptions.region = options["region"];
  }
  if (typeof options["endpoint"] === "string") {
    cliOptions.endpoint = options["endpoint"];
  }
  if (
    options["output"] === "text" ||
    options["output"] === "json" ||
    options["output"] === "yaml"
  ) {
    cliOptions.output = options["output"];
  }
  if (typeof options["verbose"] === "boolean") {
    cliOptions.verbose = options["verbose"];
  }
  if (typeof options["debug"] === "boolean") {
    cliOptions.debug = options["debug"];
  }

  return cliOptions;
}

/**
 * Load configuration for a command and configure logging from it.
 *
 * @param command - Command being run
 * @returns Resolved configuration and a store bound to its backend
 */
function prepare(command: Command): { config: LedgerConfig; store: StateStore } {
  const options = command.optsWithGlobals<Record<string, unknown>>();
  const explicitConfig =
    typeof options["config"] === "string" ? options["config"] : undefined;
  const configPath =
    explicitConfig ??
    (fileExists(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined);

  const config = loadConfigWithOverrides(
    configPath,
    extractCLIOptions(options),
  );

  if (config.verbose || config.debug) {
    logger.configure({ level: "debug" });
  }
  if (config.debug) {
    logger.configure({ timestamps: true });
  }

  const store = openStateStore(config.backend);
  logger.debug(`Using ${config.backend.type} backend at ${store.description}`);

  return { config, store };
}

/**
 * Report a command failure and exit.
 *
 * Exit codes: 2 for a malformed document, 3 for an unreachable backend,
 * 1 otherwise.
 *
 * @param err - Error thrown by the command
 */
function fail(err: unknown): never {
  if (err instanceof ConfigLoadError || err instanceof ConfigValidationError) {
    logger.error(err.message);
    process.exit(1);
  }

  logger.error(err instanceof Error ? err.message : String(err));
  if (err instanceof Error && err.cause instanceof Error) {
    logger.debug(`Caused by: ${err.cause.message}`);
  }
  process.exit(exitCodeFor(err));
}

/**
 * Parse a status argument.
 *
 * @param value - Raw argument
 * @returns Stage status
 */
function parseStatus(value: string): StageStatus {
  if (!isStageStatus(value)) {
    throw new InvalidArgumentError('Expected "started" or "completed".');
  }
  return value;
}

// =============================================================================
// Program
// =============================================================================

const program = new Command();

program
  .name("stage-ledger")
  .description(
    "Record workflow stages as started or completed so reruns can skip finished work",
  )
  .version("0.1.0")
  .optionsGroup("Backend Options:")
  .option(
    "-c, --config <path>",
    `Path to config file (default: ${DEFAULT_CONFIG_FILE} if present)`,
  )
  .option("-f, --state-file <path>", "State file path, or object key for s3")
  .addOption(
    new Option("-b, --backend <type>", "State backend").choices([
      "local",
      "s3",
    ]),
  )
  .option("--bucket <name>", "Bucket holding the state object (implies s3)")
  .option("--region <region>", "S3 region")
  .option("--endpoint <url>", "Custom S3-compatible endpoint")
  .optionsGroup("Output Options:")
  .addOption(
    new Option("-o, --output <format>", "Output format").choices([
      "text",
      "json",
      "yaml",
    ]),
  )
  .option("-v, --verbose", "Detailed progress output")
  .option("--debug", "Enable debug output");

// =============================================================================
// Ledger Commands Group
// =============================================================================
program.commandsGroup("Ledger Commands:");

program
  .command("init")
  .description("Create the state document if it does not exist")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const { store } = prepare(command);
      const created = await store.ensureInitialized();

      if (created) {
        logger.success(`Initialized ${store.description}`);
      } else {
        logger.info(`State document already present at ${store.description}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("get")
  .description("Print the recorded status of a stage")
  .argument("<stage>", "Stage name")
  .action(
    async (
      stage: string,
      _options: Record<string, unknown>,
      command: Command,
    ) => {
      try {
        const { config, store } = prepare(command);
        const status = await store.get(stage);
        console.log(
          formatStageResult({ stage, status, changed: false }, config.output.format),
        );
      } catch (err) {
        fail(err);
      }
    },
  );

program
  .command("set")
  .description("Record a stage as started or completed")
  .argument("<stage>", "Stage name")
  .argument("[status]", "started|completed", parseStatus, "started")
  .option("--dry-run", "Report what would change without writing")
  .option("--read-only", "Only report the current status, never write")
  .action(
    async (
      stage: string,
      status: StageStatus,
      options: Record<string, unknown>,
      command: Command,
    ) => {
      try {
        const { config, store } = prepare(command);
        const readOnly = options["readOnly"] === true;
        const dryRun = options["dryRun"] === true;

        // A missing document reads as empty, so lookups need no write
        if (!readOnly && !dryRun) {
          await store.ensureInitialized();
        }

        const result = readOnly
          ? await store.readOnlyGet(stage, status)
          : await store.set(stage, status, { dryRun });

        console.log(formatStageResult(result, config.output.format));
      } catch (err) {
        fail(err);
      }
    },
  );

program
  .command("show")
  .description("Print every recorded stage")
  .action(async (_options: Record<string, unknown>, command: Command) => {
    try {
      const { config, store } = prepare(command);
      const doc = await store.load();
      console.log(formatDocument(doc, config.output.format));
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync();
