/**
 * Telemetry & Observability
 *
 * Responsibilities:
 * - Structured logging (JSON or pretty)
 * - Request correlation
 * - Distributed tracing of requests and deferred tasks (W3C Trace Context)
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  isLogLevel,
  toError,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
  type RequestLogContext,
} from './logger.ts';

export {
  setupTracing,
  isTracingEnabled,
  getTracer,
  withSpan,
  runWithContext,
  extractContextFromHeaders,
  createHttpServerSpan,
  setRouteAttribute,
  endHttpServerSpan,
  getTraceId,
  SpanKind,
  SpanStatusCode,
  type TracingOptions,
  type TracingHandle,
  type CreateSpanOptions,
  type HttpServerSpanOptions,
  type Span,
  type Context as TraceContext,
} from './otel.ts';
