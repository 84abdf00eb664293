/**
 * Middleware Pipeline
 *
 * Manages the execution of middleware in a chain (onion model).
 * Each middleware can:
 * - Inspect the request before the handler
 * - Short-circuit and return an early response
 * - Inspect or replace the response after the handler
 */

import type { Context, Middleware, Next, RouteHandler } from '../http/types.ts';

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private middleware: Middleware[] = [];

  constructor(middleware: Middleware[] = []) {
    this.middleware = [...middleware];
  }

  /**
   * Add middleware to the pipeline
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Get the number of middleware in the pipeline
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Execute the pipeline, running the handler innermost
   */
  async execute(ctx: Context, handler: RouteHandler): Promise<Response> {
    const dispatch = async (index: number): Promise<Response> => {
      const middleware = this.middleware[index];
      if (!middleware) {
        return await handler(ctx);
      }

      let called = false;
      const next: Next = async () => {
        if (called) {
          throw new Error('next() called multiple times');
        }
        called = true;
        return await dispatch(index + 1);
      };

      return await middleware(ctx, next);
    };

    return await dispatch(0);
  }
}

/**
 * Create a middleware that runs conditionally
 */
export function conditional(
  condition: (ctx: Context) => boolean,
  middleware: Middleware
): Middleware {
  return async (ctx, next) => {
    if (condition(ctx)) {
      return await middleware(ctx, next);
    }
    return await next();
  };
}

/**
 * Create a middleware that runs for specific paths
 */
export function forPath(pathPrefix: string, middleware: Middleware): Middleware {
  return conditional((ctx) => ctx.url.pathname.startsWith(pathPrefix), middleware);
}

/**
 * Create a middleware that runs for specific methods
 */
export function forMethods(methods: string[], middleware: Middleware): Middleware {
  const methodSet = new Set(methods.map((m) => m.toUpperCase()));
  return conditional((ctx) => methodSet.has(ctx.method), middleware);
}
