export {
  createLogger,
  createTextFormatter,
  FileTransport,
  getLogger,
  isLogLevel,
  jsonLineFormatter,
  LOG_LEVELS,
  redactValue,
  setGlobalLogger,
  shouldLog,
  StderrTransport,
  StructuredLogger,
} from "./logger.js";
export type { LogContext, LogEntry, LogFormatter, Logger, LoggerOptions, LogLevel, LogTransport } from "./logger.js";
