/**
 * Application Class
 *
 * The main entry point for building applications.
 * Orchestrates the framework layers: every request gets a context with its
 * own DeferredTasks list, and that list is handed to the TaskRunner only
 * after the response has been sent.
 */

import { randomUUID } from 'node:crypto';
import type { AddressInfo } from 'node:net';
import { Server } from './http/server.ts';
import { AppRequest } from './http/request.ts';
import { AppResponse } from './http/response.ts';
import { ValidationError } from './http/validation.ts';
import type { Context, Middleware, RequestHooks, RequestListener, RouteHandler } from './http/types.ts';
import { Router, type RouteDefinition, type RouteOptions } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Config, type ConfigOptions } from './config/config.ts';
import { getLogger, createRequestLogger, toError, type Logger } from './telemetry/logger.ts';
import {
  createHttpServerSpan,
  endHttpServerSpan,
  getTraceId,
  runWithContext,
  setRouteAttribute,
  type Context as TraceContext,
  type Span,
} from './telemetry/otel.ts';
import { DeferredTasks } from './tasks/deferred.ts';
import { TaskRunner } from './tasks/runner.ts';
import { Lifecycle } from './runtime/lifecycle.ts';
import { HttpStatus, notFoundError, serverError, validationError } from './api/response.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  logger?: Logger;
  runner?: TaskRunner;
  lifecycle?: Lifecycle;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
}

/**
 * Main Application class
 */
export class Application {
  private server: Server | null = null;
  private router: Router;
  private middleware: Middleware[] = [];
  private config: Config;
  private logger: Logger;
  private runner: TaskRunner;
  private lifecycle: Lifecycle;
  private shutdownRegistered = false;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? getLogger();
    this.router = new Router();
    this.runner = options.runner ?? new TaskRunner({ logger: this.logger });
    this.lifecycle = options.lifecycle ?? new Lifecycle({ logger: this.logger });
  }

  /**
   * Add global middleware
   */
  use(middleware: Middleware): this {
    this.middleware.push(middleware);
    return this;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  put(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.put(path, handler, options);
    return this;
  }

  patch(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.patch(path, handler, options);
    return this;
  }

  delete(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.delete(path, handler, options);
    return this;
  }

  getRoutes(): RouteDefinition[] {
    return this.router.getRoutes();
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getRunner(): TaskRunner {
    return this.runner;
  }

  /**
   * Handle a request without a socket. Deferred tasks are dispatched on the
   * next macrotask, after the returned promise has resolved.
   */
  fetch(request: Request): Promise<Response> {
    const hooks: RequestHooks = {
      afterResponse: (callback) => {
        setImmediate(() => {
          try {
            callback();
          } catch (error) {
            this.logger.error('After-response callback failed', error);
          }
        });
      },
    };
    return this.handle(request, hooks);
  }

  /**
   * Start the server. Resolves with the bound address.
   */
  async listen(options: ListenOptions = {}): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Application is already listening');
    }

    const port = options.port ?? this.config.getNumber('port', 8000);
    const hostname = options.hostname ?? this.config.getString('host', '0.0.0.0');

    const server = new Server(this.createHandler(), { port, hostname, logger: this.logger });
    const address = await server.listen();
    this.server = server;

    if (!this.shutdownRegistered) {
      this.shutdownRegistered = true;
      this.lifecycle.onShutdown(() => this.stop());
    }

    this.logger.info(`Server listening on http://${address.address}:${address.port}`);
    return address;
  }

  /**
   * Stop accepting requests, then wait for deferred tasks still running
   */
  async stop(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await server.close();
      this.logger.info('Server closed');
    }

    const pending = this.runner.pending;
    if (pending === 0) return;

    const timeoutMs = this.config.getNumber('tasks.drainTimeout', 15000);
    this.logger.info('Waiting for deferred tasks', { pending, timeoutMs });

    const drained = await this.runner.drain(timeoutMs);
    if (!drained) {
      this.logger.warn('Deferred tasks still running after drain timeout', {
        pending: this.runner.pending,
      });
    }
  }

  /**
   * Create the request listener the server drives
   */
  createHandler(): RequestListener {
    return (request, hooks) => this.handle(request, hooks);
  }

  private async handle(request: Request, hooks: RequestHooks): Promise<Response> {
    const url = new URL(request.url);
    const method = request.method;
    const requestId = request.headers.get('x-request-id') ?? randomUUID();

    const { span, context: traceContext } = createHttpServerSpan({
      method,
      url,
      headers: request.headers,
      requestId,
    });
    const logger = createRequestLogger(this.logger, {
      requestId,
      method,
      path: url.pathname,
      traceId: getTraceId(traceContext),
    });
    const tasks = new DeferredTasks();

    let response: Response;
    let failure: Error | undefined;

    try {
      response = await this.route(request, url, requestId, span, traceContext, logger, tasks);
    } catch (error) {
      this.discardTasks(tasks, logger);

      if (error instanceof ValidationError) {
        logger.debug('Request validation failed', { fields: error.fields });
        response = new AppResponse()
          .status(HttpStatus.UNPROCESSABLE_ENTITY)
          .json(validationError(error.fields));
      } else {
        failure = toError(error);
        logger.error('Request error', failure);
        response = new AppResponse()
          .status(HttpStatus.INTERNAL_SERVER_ERROR)
          .json(serverError('Internal server error', failure, this.config.getString('env', 'development')));
      }
    }

    if (!tasks.dispatched) {
      hooks.afterResponse(() => {
        this.runner.dispatch(tasks, { requestId, logger, parentContext: traceContext });
      });
    }

    endHttpServerSpan(span, response.status, failure);
    return response;
  }

  private async route(
    request: Request,
    url: URL,
    requestId: string,
    span: Span,
    traceContext: TraceContext,
    logger: Logger,
    tasks: DeferredTasks
  ): Promise<Response> {
    const method = request.method;
    const match = this.router.match(method, url.pathname);
    if (!match) {
      logger.debug('No route matched');
      return new AppResponse()
        .status(HttpStatus.NOT_FOUND)
        .json(notFoundError(`Route ${method} ${url.pathname}`));
    }

    setRouteAttribute(span, match.route.path, method);

    const req = new AppRequest(request, { params: match.params });
    const ctx: Context = {
      request,
      req,
      url,
      params: match.params,
      query: url.searchParams,
      state: req.state,
      header: (name: string) => request.headers.get(name),
      method,
      requestId,
      logger,
      tasks,
    };

    const pipeline = new MiddlewarePipeline([...this.middleware, ...match.route.middleware]);
    return await runWithContext(traceContext, () => pipeline.execute(ctx, match.handler));
  }

  private discardTasks(tasks: DeferredTasks, logger: Logger): void {
    const names = tasks.names();
    tasks.take();
    if (names.length > 0) {
      logger.warn('Discarding deferred tasks after handler error', {
        count: names.length,
        tasks: names,
      });
    }
  }
}
