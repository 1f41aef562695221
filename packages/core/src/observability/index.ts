export {
  StrataLogger,
  createLogger,
  serializeLogValue,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type LogLevel,
  type StrataLoggerConfig,
} from './logger.js';
