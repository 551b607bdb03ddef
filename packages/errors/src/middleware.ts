/**
 * @fileoverview Hono middleware for error handling
 * @module @tasklink/errors/middleware
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, notFoundHandler } from '@tasklink/errors/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.notFound(notFoundHandler());
 * ```
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { TaskLinkError, NotFoundError, wrapError } from './index.js';

/**
 * Error handler configuration
 */
export interface ErrorHandlerConfig {
  /**
   * Whether to include stack traces in error responses.
   * Should be false in production.
   */
  includeStack?: boolean;

  /**
   * Called for every error before the response is sent.
   * A failure inside the callback is reported to `console.error` and does
   * not change the response.
   */
  onError?: (error: TaskLinkError, ctx: Context) => void | Promise<void>;

  /**
   * Custom headers to add to error responses.
   */
  headers?: Record<string, string>;
}

/**
 * Create an error handler for Hono that renders every failure as the
 * `{ error: { code, kind, message, ... } }` envelope.
 *
 * @example
 * ```typescript
 * app.onError(errorHandler({
 *   includeStack: process.env.NODE_ENV !== 'production',
 *   onError: (error) => logger.error('request failed', error),
 * }));
 * ```
 */
export function errorHandler(config: ErrorHandlerConfig = {}): ErrorHandler {
  const { includeStack = false, onError, headers = {} } = config;

  return async (error: Error, ctx: Context) => {
    const taskLinkError = wrapError(error);

    if (onError) {
      try {
        await onError(taskLinkError, ctx);
      } catch (callbackError) {
        console.error('errorHandler onError callback failed', callbackError);
      }
    }

    const payload = taskLinkError.toPayload();

    if (includeStack && taskLinkError.stack) {
      payload.stack = taskLinkError.stack;
    }

    const stored: unknown = ctx.get('requestId');
    const requestId = ctx.req.header('x-request-id') ?? (typeof stored === 'string' ? stored : undefined);
    if (requestId) {
      payload.requestId = requestId;
    }

    for (const [key, value] of Object.entries(headers)) {
      ctx.header(key, value);
    }

    return ctx.json({ error: payload }, taskLinkError.statusCode);
  };
}

/**
 * Create a 404 handler for Hono.
 */
export function notFoundHandler(): NotFoundHandler {
  return (ctx: Context) => {
    const error = new NotFoundError(`No route for ${ctx.req.method} ${ctx.req.path}`, {
      details: { path: ctx.req.path, method: ctx.req.method },
    });

    return ctx.json(error.toJSON(), 404);
  };
}
