/**
 * OpenTelemetry Integration
 *
 * Tracing for incoming requests and the deferred work they schedule.
 * A request gets a SERVER span; every deferred task runs in its own span
 * parented on that request span, so the trace shows work that outlived
 * the response it came from.
 *
 * When tracing is not set up, the API hands out no-op spans and every
 * helper here still works.
 *
 * @module
 */

import {
  trace,
  context,
  propagation,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import {
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import { Resource } from '@opentelemetry/resources';
import { toError } from './logger.ts';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Tracing configuration
 */
export interface TracingOptions {
  /** Register a tracer provider at all */
  enabled: boolean;
  /** Reported as service.name */
  serviceName?: string;
  /** 'console' prints finished spans, 'none' records without exporting */
  exporter?: 'console' | 'none' | SpanExporter;
}

export interface TracingHandle {
  shutdown(): Promise<void>;
}

const TRACER_NAME = 'background-tasks-demo';
const TRACER_VERSION = '0.1.0';

let provider: NodeTracerProvider | null = null;

// ============================================================================
// Setup
// ============================================================================

/**
 * Register the global tracer provider, context manager and W3C propagator
 */
export function setupTracing(options: TracingOptions): TracingHandle {
  if (!options.enabled) {
    return { shutdown: () => Promise.resolve() };
  }
  if (provider) {
    throw new Error('Tracing is already set up');
  }

  const current = new NodeTracerProvider({
    resource: new Resource({ 'service.name': options.serviceName ?? TRACER_NAME }),
  });

  const exporter = options.exporter ?? 'console';
  if (exporter === 'console') {
    current.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  } else if (exporter !== 'none') {
    current.addSpanProcessor(new SimpleSpanProcessor(exporter));
  }

  current.register();
  provider = current;

  return {
    shutdown: async () => {
      if (provider !== current) return;
      provider = null;
      await current.shutdown();
      trace.disable();
      context.disable();
      propagation.disable();
    },
  };
}

/**
 * Whether a tracer provider is registered
 */
export function isTracingEnabled(): boolean {
  return provider !== null;
}

/**
 * Get the application tracer
 */
export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME, TRACER_VERSION);
}

// ============================================================================
// Span Utilities
// ============================================================================

/**
 * Options for creating a new span
 */
export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  /** Initial attributes */
  attributes?: Attributes;
  /** Parent context (uses current context if not provided) */
  parentContext?: Context;
}

/**
 * Create a new span and run a function within its context.
 * The span is ended when the function settles; a thrown error is
 * recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  const parentCtx = options.parentContext ?? context.active();

  return getTracer().startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    parentCtx,
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = toError(error);
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Run an async function with a context made active
 */
export function runWithContext<T>(ctx: Context, fn: () => Promise<T>): Promise<T> {
  return context.with(ctx, fn);
}

/**
 * Extract W3C trace context (traceparent, tracestate) from request headers
 */
export function extractContextFromHeaders(headers: Headers): Context {
  const carrier: Record<string, string> = {};
  headers.forEach((value, key) => {
    carrier[key.toLowerCase()] = value;
  });

  return propagation.extract(context.active(), carrier);
}

// ============================================================================
// HTTP Request Span Helpers
// ============================================================================

export interface HttpServerSpanOptions {
  method: string;
  url: URL;
  headers: Headers;
  requestId: string;
}

/**
 * Create an HTTP server span for an incoming request.
 * The returned context carries the span and is the parent of everything
 * the request does, deferred tasks included.
 */
export function createHttpServerSpan(options: HttpServerSpanOptions): {
  span: Span;
  context: Context;
} {
  const parentCtx = extractContextFromHeaders(options.headers);

  const span = getTracer().startSpan(
    `HTTP ${options.method}`,
    {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': options.method,
        'url.full': options.url.href,
        'url.path': options.url.pathname,
        'url.query': options.url.search,
        'user_agent.original': options.headers.get('user-agent') ?? '',
        'request.id': options.requestId,
      },
    },
    parentCtx,
  );

  return { span, context: trace.setSpan(parentCtx, span) };
}

/**
 * Name the server span after the matched route
 */
export function setRouteAttribute(span: Span, routePattern: string, method: string): void {
  span.setAttribute('http.route', routePattern);
  span.updateName(`${method} ${routePattern}`);
}

/**
 * End an HTTP server span with response information
 */
export function endHttpServerSpan(span: Span, status: number, error?: Error): void {
  span.setAttribute('http.response.status_code', status);

  if (error) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  } else if (status >= 500) {
    span.setStatus({ code: SpanStatusCode.ERROR });
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }

  span.end();
}

/**
 * Trace id of the span carried by a context, when one is recording
 */
export function getTraceId(ctx: Context): string | undefined {
  const span = trace.getSpan(ctx);
  if (!span || !span.isRecording()) return undefined;
  return span.spanContext().traceId;
}

export { SpanKind, SpanStatusCode, type Span, type Context };
