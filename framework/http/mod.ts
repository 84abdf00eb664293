/**
 * Layer 1: HTTP/Server Layer
 *
 * First abstraction layer, built on node:http.
 * Bridges Node's request/response streams to Fetch Request/Response.
 *
 * Responsibilities:
 * - Normalize HTTP variations
 * - Provide consistent developer interface
 * - Validate request input
 * - Tell the application when a response has been sent
 */

export { Server, type ServerOptions } from './server.ts';
export { AppRequest, type RequestContext } from './request.ts';
export { AppResponse } from './response.ts';
export { ParamReader, ValidationError, type FieldErrors } from './validation.ts';
export type {
  Context,
  Middleware,
  Next,
  RouteHandler,
  HttpMethod,
  RequestHooks,
  RequestListener,
} from './types.ts';
