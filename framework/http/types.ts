/**
 * HTTP Type Definitions
 */

import type { AppRequest } from './request.ts';
import type { Logger } from '../telemetry/logger.ts';
import type { DeferredTasks } from '../tasks/deferred.ts';

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: Request;
  req: AppRequest;
  url: URL;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  header(name: string): string | null;
  method: string;
  requestId: string;
  /** Request-scoped logger (carries requestId, method, path) */
  logger: Logger;
  /** Work to run after this request's response is sent */
  tasks: DeferredTasks;
}

/**
 * Middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Route handler using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * Middleware function signature
 */
export type Middleware = (
  ctx: Context,
  next: Next
) => Promise<Response> | Response;

/**
 * Per-request hooks the server offers the application
 */
export interface RequestHooks {
  /** Run a callback once the response has been sent or the connection closed */
  afterResponse(callback: () => void): void;
}

/**
 * Fetch-style request listener the server drives
 */
export type RequestListener = (request: Request, hooks: RequestHooks) => Promise<Response>;

/**
 * HTTP methods routes can be registered for
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';
