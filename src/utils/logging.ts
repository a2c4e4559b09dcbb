/**
 * Logging utilities with color support.
 *
 * Every log line goes to stderr so that command results printed on stdout
 * stay machine-readable (`--output json`).
 */

import chalk from "chalk";

/**
 * Log levels. `silent` suppresses everything.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
}

const defaultConfig: LoggerConfig = {
  level: "info",
  timestamps: false,
  colors: true,
};

let config: LoggerConfig = { ...defaultConfig };

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type MessageLevel = Exclude<LogLevel, "silent">;

/**
 * Configure the logger.
 *
 * @param newConfig - Partial configuration to apply
 */
export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Restore the default configuration.
 */
export function resetLogger(): void {
  config = { ...defaultConfig };
}

/**
 * Current logger configuration (copy).
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...config };
}

function shouldLog(level: MessageLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level];
}

const LEVEL_COLORS: Record<MessageLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * Format a log message.
 *
 * @param level - Log level
 * @param message - Message to format
 * @param scope - Optional component name shown after the level
 * @returns Formatted message
 */
export function formatMessage(
  level: MessageLevel,
  message: string,
  scope?: string,
): string {
  let prefix = "";

  if (config.timestamps) {
    prefix += `[${new Date().toISOString()}] `;
  }

  const tag = `[${level.toUpperCase()}]`;
  prefix += config.colors ? LEVEL_COLORS[level](tag) : tag;

  if (scope) {
    prefix += config.colors ? chalk.dim(` (${scope})`) : ` (${scope})`;
  }

  return `${prefix} ${message}`;
}

function emit(
  level: MessageLevel,
  scope: string | undefined,
  message: string,
  args: unknown[],
): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, scope), ...args);
  }
}

/**
 * Log a debug message.
 */
export function debug(message: string, ...args: unknown[]): void {
  emit("debug", undefined, message, args);
}

/**
 * Log an info message.
 */
export function info(message: string, ...args: unknown[]): void {
  emit("info", undefined, message, args);
}

/**
 * Log a warning message.
 */
export function warn(message: string, ...args: unknown[]): void {
  emit("warn", undefined, message, args);
}

/**
 * Log an error message.
 */
export function error(message: string, ...args: unknown[]): void {
  emit("error", undefined, message, args);
}

/**
 * Log a success message.
 *
 * @param message - Message to log
 */
export function success(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.green(`✅ ${message}`)
      : `[SUCCESS] ${message}`;
    console.error(formatted);
  }
}

/**
 * Log a failure message.
 *
 * @param message - Message to log
 */
export function failure(message: string): void {
  if (shouldLog("info")) {
    const formatted = config.colors
      ? chalk.red(`❌ ${message}`)
      : `[FAILURE] ${message}`;
    console.error(formatted);
  }
}

/**
 * Create a table for CLI output.
 *
 * @param headers - Column headers
 * @param rows - Table rows
 * @returns Formatted table string
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => {
    const rowMax = Math.max(0, ...rows.map((r) => (r[i] ?? "").length));
    return Math.max(h.length, rowMax);
  });

  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(" | ");
  const separator = widths.map((w) => "-".repeat(w)).join("-+-");

  const dataRows = rows.map((row) =>
    row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(" | "),
  );

  return [headerRow, separator, ...dataRows].join("\n");
}

/**
 * Logger bound to a component name.
 */
export interface ScopedLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines carry a component name.
 *
 * @param scope - Component name, e.g. "s3"
 * @returns Scoped logger sharing the global configuration
 */
export function createLogger(scope: string): ScopedLogger {
  return {
    debug: (message, ...args) => {
      emit("debug", scope, message, args);
    },
    info: (message, ...args) => {
      emit("info", scope, message, args);
    },
    warn: (message, ...args) => {
      emit("warn", scope, message, args);
    },
    error: (message, ...args) => {
      emit("error", scope, message, args);
    },
  };
}

/**
 * Default logger instance.
 */
export const logger = {
  debug,
  info,
  warn,
  error,
  success,
  failure,
  table,
  child: createLogger,
  configure: configureLogger,
};
