/**
 * @fileoverview Structured logging for tasklink
 * @module @tasklink/logger
 *
 * - Structured logging with levels (debug, info, warn, error, fatal)
 * - Credential redaction in every entry's context
 * - Request correlation and HTTP request logging for Hono
 *
 * @example
 * ```typescript
 * import { logger, configureLogger, createRequestLogger } from '@tasklink/logger';
 *
 * configureLogger({ level: 'debug', format: 'pretty' });
 *
 * logger.info('Calling ClickUp', { operation: 'get-task', token: 'pk_x' });
 * // context.token is logged as "[REDACTED]"
 *
 * app.use('*', createRequestLogger());
 * ```
 */

export {
  Logger,
  logger,
  createLogger,
  configureLogger,
  getLoggerConfig,
  resetLoggerConfig,
  redact,
  REDACTED,
  DEFAULT_REDACT_KEYS,
} from './logger.js';

export {
  createRequestLogger,
  getLogger,
  generateRequestId,
  type LoggerEnv,
  type RequestLoggerConfig,
} from './middleware.js';

export {
  type LogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogOutput,
  type LogData,
  type LogMethod,
  type ErrorInfo,
  type HttpInfo,
  type ILogger,
  LOG_LEVELS,
  isLogLevel,
} from './types.js';
