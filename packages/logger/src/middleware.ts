/**
 * @fileoverview Hono middleware for request logging
 * @module @tasklink/logger/middleware
 */

import type { Context, MiddlewareHandler } from 'hono';
import { Logger, createLogger } from './logger.js';
import type { HttpInfo, LogLevel } from './types.js';

/**
 * Context variables set by {@link createRequestLogger}.
 */
export type LoggerEnv = {
  Variables: {
    logger: Logger;
    requestId: string;
  };
};

/**
 * Request logging middleware configuration.
 */
export interface RequestLoggerConfig {
  /** Log level for successful requests */
  successLevel?: LogLevel;
  /** Log level for error requests (4xx/5xx) */
  errorLevel?: LogLevel;
  /** Paths to skip logging */
  skipPaths?: string[];
  /** Whether to log the (redacted) query string */
  logQuery?: boolean;
  /** Custom message format function */
  formatMessage?: (info: HttpInfo) => string;
}

const DEFAULT_REQUEST_LOGGER_CONFIG: Required<RequestLoggerConfig> = {
  successLevel: 'info',
  errorLevel: 'warn',
  skipPaths: ['/health'],
  logQuery: true,
  formatMessage: (info) =>
    `${info.method} ${info.path} ${info.statusCode ?? 0} ${info.durationMs ?? 0}ms`,
};

/**
 * Create a request logger middleware for Hono.
 *
 * Every request gets an `x-request-id` (taken from the request or generated),
 * echoed on the response and bound to a child logger stored as `logger`.
 *
 * @example
 * ```typescript
 * const app = new Hono<LoggerEnv>();
 * app.use('*', createRequestLogger());
 * ```
 */
export function createRequestLogger(config: RequestLoggerConfig = {}): MiddlewareHandler<LoggerEnv> {
  const finalConfig = { ...DEFAULT_REQUEST_LOGGER_CONFIG, ...config };

  return async (c, next) => {
    const { req } = c;
    const path = req.path;
    const requestId = req.header('x-request-id') ?? generateRequestId();

    const reqLogger = createLogger({ requestId });
    reqLogger.setRequestId(requestId);

    c.set('logger', reqLogger);
    c.set('requestId', requestId);
    c.header('x-request-id', requestId);

    if (finalConfig.skipPaths.includes(path)) {
      await next();
      return;
    }

    const start = performance.now();

    try {
      await next();
    } finally {
      const durationMs = Math.round(performance.now() - start);
      const statusCode = c.res.status;

      const httpInfo: HttpInfo = {
        method: req.method,
        path,
        statusCode,
        userAgent: req.header('user-agent'),
        ip: req.header('x-forwarded-for') ?? req.header('x-real-ip'),
        durationMs,
      };
      if (finalConfig.logQuery) {
        httpInfo.query = req.query();
      }

      const message = finalConfig.formatMessage(httpInfo);
      const level = statusCode >= 400 ? finalConfig.errorLevel : finalConfig.successLevel;

      reqLogger[level](message, { http: httpInfo, durationMs });
    }
  };
}

/**
 * Get the request-scoped logger, or a fresh one when the request logger
 * middleware is not installed.
 */
export function getLogger(c: Context<LoggerEnv>): Logger {
  const existing: Logger | undefined = c.get('logger');
  return existing ?? createLogger();
}

/**
 * Generate a request ID.
 * @returns UUID v4 request ID
 */
export function generateRequestId(): string {
  return crypto.randomUUID();
}
