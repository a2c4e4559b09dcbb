/**
 * Utility module exports.
 */

export {
  logger,
  configureLogger,
  resetLogger,
  getLoggerConfig,
  createLogger,
  formatMessage,
  debug,
  info,
  warn,
  error,
  success,
  failure,
  table,
  type LogLevel,
  type LoggerConfig,
  type ScopedLogger,
} from "./logging.js";

export {
  ensureDir,
  readText,
  writeText,
  fileExists,
  resolvePath,
  fsErrorCode,
} from "./file-io.js";
