/**
 * Observability
 * @module s3-complete-multipart/observability
 */

export {
  LOG_LEVELS,
  ConsoleLogger,
  NoopLogger,
  isLogLevel,
  describeRequest,
  logError,
  type Logger,
  type LogLevel,
  type LogContext,
} from './logging.js';
