/**
 * OpenTelemetry Integration
 *
 * Thin helpers over `@opentelemetry/api`. When no SDK is registered the API
 * hands out no-op tracers, so every helper here is safe to call whether or
 * not tracing is configured. Set `OTEL_ENABLED=true` once an SDK is wired in
 * to have spans created for requests, KV operations and cache lookups.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';

/**
 * Check if OpenTelemetry is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the currently active span, if tracing is enabled
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Set the http.route attribute on the active span
 */
export function setRouteAttribute(routePattern: string, method: string): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    span.updateName(`${method} ${routePattern}`);
  }
}

/**
 * Record an exception on the active span and set error status
 */
export function recordSpanException(error: Error, message?: string): void {
  const span = getActiveSpan();
  if (span) {
    span.recordException(error);
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: message ?? error.message,
    });
  }
}

let _tracer: Tracer | undefined;

/**
 * Get the application tracer
 */
export function getOTELTracer(name = 'inkwell', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
  parentContext?: Context;
}

/**
 * Run `fn` inside a new active span. The span is ended when `fn` settles.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  const tracer = getOTELTracer();
  const parentCtx = options.parentContext ?? context.active();

  return tracer.startActiveSpan(
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
        const err = error instanceof Error ? error : new Error(String(error));
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
 * Create a database client span around a KV operation
 */
export async function withDbSpan<T>(
  operation: string,
  key: readonly unknown[],
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return withSpan(`db.${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'db.system': 'sqlite',
      'db.operation': operation,
      'db.key': JSON.stringify(key),
    },
  });
}

export { trace, context, SpanKind, SpanStatusCode, type Tracer, type Span, type Attributes };
