/**
 * Logging - Structured JSON-lines logger
 */

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
} from './logger.js';
