/**
 * URL Router
 *
 * Method + URLPattern matching. Routes are tried in registration order and
 * the first match wins.
 */

import { URLPattern } from 'urlpattern-polyfill';
import type { HttpMethod, Middleware, RouteHandler } from '../http/types.ts';
import { ValidationError } from '../http/validation.ts';

export interface RouteMeta {
  /** Human-readable summary, listed by the index route */
  description?: string;
  [key: string]: unknown;
}

export interface RouteOptions {
  name?: string;
  middleware?: Middleware[];
  meta?: RouteMeta;
}

export interface RouteDefinition {
  method: HttpMethod | HttpMethod[] | '*';
  path: string;
  pattern: URLPattern;
  handler: RouteHandler;
  middleware: Middleware[];
  name?: string;
  meta?: RouteMeta;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
  handler: RouteHandler;
}

/**
 * URL Router
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private namedRoutes = new Map<string, RouteDefinition>();
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  put(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('PUT', path, handler, options);
  }

  patch(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('PATCH', path, handler, options);
  }

  delete(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('DELETE', path, handler, options);
  }

  /**
   * Register a route for all methods
   */
  all(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('*', path, handler, options);
  }

  /**
   * Add a route with explicit method
   */
  addRoute(
    method: HttpMethod | HttpMethod[] | '*',
    path: string,
    handler: RouteHandler,
    options: RouteOptions = {}
  ): this {
    const fullPath = this.prefix + path;

    const route: RouteDefinition = {
      method,
      path: fullPath,
      pattern: new URLPattern({ pathname: fullPath }),
      handler,
      middleware: options.middleware ?? [],
      name: options.name,
      meta: options.meta,
    };

    this.routes.push(route);

    if (options.name) {
      this.namedRoutes.set(options.name, route);
    }

    return this;
  }

  /**
   * Match a method and path to a route. Parameters are percent-decoded;
   * a malformed escape raises a ValidationError naming the parameter.
   */
  match(method: string, path: string): RouteMatch | null {
    const { pathname } = new URL(path, 'http://localhost');

    for (const route of this.routes) {
      if (!methodMatches(route.method, method)) {
        continue;
      }

      const result = route.pattern.exec({ pathname });
      if (result) {
        const params: Record<string, string> = {};
        for (const [key, value] of Object.entries(result.pathname.groups)) {
          if (value !== undefined) {
            params[key] = decodeParam(key, value);
          }
        }
        return { route, params, handler: route.handler };
      }
    }

    return null;
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: Record<string, string> = {}): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;

    let path = route.path;
    for (const [key, value] of Object.entries(params)) {
      path = path.replace(`:${key}`, encodeURIComponent(value));
    }

    return path;
  }

  /**
   * All registered routes, in registration order
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }
}

function methodMatches(expected: RouteDefinition['method'], actual: string): boolean {
  if (expected === '*') return true;
  const methods = Array.isArray(expected) ? expected : [expected];
  return methods.some((method) => method === actual);
}

function decodeParam(name: string, value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    throw new ValidationError({ [name]: ['Malformed percent-encoding'] });
  }
}
