/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  type LogOutput,
  LoggerConfigSchema,
  type LoggerConfig,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  parseLogFormat,
  shouldLog,
  formatError,
} from './types.js';

export {
  Logger,
  createLoggerFromEnv,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
} from './logger.js';
