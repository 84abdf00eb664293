/**
 * Framework
 *
 * A small layered web framework on Node.js whose requests can defer work
 * until after their response is sent.
 *
 * @module framework
 */

// Application
export { Application, type ApplicationOptions, type ListenOptions } from './app.ts';

// Layer 0: Runtime
export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// Layer 1: HTTP/Server
export {
  Server,
  AppRequest,
  AppResponse,
  ParamReader,
  ValidationError,
  type Context,
  type Middleware,
  type Next,
  type RouteHandler,
  type ServerOptions,
  type RequestHooks,
} from './http/mod.ts';

// Layer 2: Middleware
export {
  MiddlewarePipeline,
  conditional,
  forPath,
  forMethods,
  loggingMiddleware,
  type LoggingOptions,
} from './middleware/mod.ts';

// Layer 3: Router
export { Router, type RouteDefinition, type RouteMeta, type RouteOptions } from './router/mod.ts';

// Deferred tasks
export {
  DeferredTasks,
  TaskRunner,
  TaskStateError,
  type DeferredTask,
  type DispatchMeta,
  type TaskRunnerStats,
} from './tasks/mod.ts';

// Config
export { Config, loadConfig, configFromEnv, type ConfigOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  setupTracing,
  type LogLevel,
  type LogEntry,
  type TracingOptions,
  type TracingHandle,
} from './telemetry/mod.ts';

// API
export {
  apiError,
  validationError,
  notFoundError,
  serverError,
  HttpStatus,
  type ApiResponse,
} from './api/mod.ts';
