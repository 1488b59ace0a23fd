export {
  RelayLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type RelayLoggerConfig,
} from './logger.js';
