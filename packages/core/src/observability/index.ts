export {
  EngineLogger,
  LEVEL_PRIORITY,
  createLogger,
  formatLogEntry,
  isDebugMode,
  setDebugMode,
  silentLogger,
  type EngineLoggerConfig,
  type LogEntry,
  type LogLevel,
} from './logger.js';
