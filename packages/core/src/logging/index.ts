/**
 * @fileoverview Logging exports
 */

export {
  TrellisLogger,
  getLogger,
  createLogger,
  configureLogging,
  resetLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
