/**
 * Logging Middleware
 *
 * Request/response logging through the request-scoped logger, so every
 * line carries the request id its deferred tasks will also log with.
 */

import type { Middleware } from '../http/types.ts';

export interface LoggingOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<LoggingOptions> = {
  logRequest: true,
  logResponse: true,
  excludePaths: ['/health', '/favicon.ico'],
};

/**
 * Create logging middleware
 */
export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return async (ctx, next) => {
    if (opts.excludePaths.some((path) => ctx.url.pathname.startsWith(path))) {
      return await next();
    }

    const startTime = performance.now();

    if (opts.logRequest) {
      ctx.logger.info('Request received', { ip: ctx.req.ip });
    }

    const response = await next();

    if (opts.logResponse) {
      const duration = Math.round((performance.now() - startTime) * 100) / 100;
      const fields = { status: response.status, duration, deferredTasks: ctx.tasks.size };
      if (response.status >= 500) {
        ctx.logger.error('Response sent', undefined, fields);
      } else if (response.status >= 400) {
        ctx.logger.warn('Response sent', fields);
      } else {
        ctx.logger.info('Response sent', fields);
      }
    }

    return response;
  };
}
