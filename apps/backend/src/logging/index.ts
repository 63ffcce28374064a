export {
  createLogger,
  formatLogEntry,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions
} from "./logger.js";
