/**
 * Request Tracing
 *
 * Span helpers for the server and the router, on top of @opentelemetry/api.
 * Without a registered SDK every span is non-recording. Annotation of the
 * active span is gated on OTEL_ENABLED=true.
 *
 * @module
 */

import {
  context,
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Context,
  type Span,
  type Tracer,
} from '@opentelemetry/api';

export const TRACER_NAME = 'switchyard';

/** Attribute naming the dispatch stage a failure came from */
export const DISPATCH_STAGE_ATTRIBUTE = 'switchyard.dispatch.stage';

const INVALID_SPAN = trace.wrapSpanContext({
  traceId: '00000000000000000000000000000000',
  spanId: '0000000000000000',
  traceFlags: 0,
});

export function isTracingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.OTEL_ENABLED === 'true';
}

/**
 * The span of the request being handled, when tracing is on
 */
export function currentSpan(): Span | undefined {
  return isTracingEnabled() ? trace.getActiveSpan() : undefined;
}

let cachedTracer: Tracer | undefined;

export function getTracer(): Tracer {
  if (!cachedTracer) {
    cachedTracer = trace.getTracer(TRACER_NAME);
  }
  return cachedTracer;
}

/**
 * Name the request span after the matched route pattern, so that
 * `/users/1` and `/users/2` aggregate as `GET /users/:id`
 */
export function annotateRoute(method: string, pattern: string): void {
  const span = currentSpan();
  if (!span) return;
  span.setAttribute('http.route', pattern);
  span.updateName(`${method} ${pattern}`);
}

/**
 * Mark the request span as failed
 */
export function annotateFailure(span: Span | undefined, error: Error, stage?: string): void {
  if (!span) return;
  span.recordException(error);
  if (stage) {
    span.setAttribute(DISPATCH_STAGE_ATTRIBUTE, stage);
  }
  span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
}

export interface SpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
  parent?: Context;
}

/**
 * Run fn inside a new active span, ended when fn settles. A rejection is
 * recorded on the span and rethrown; the status is otherwise left unset.
 */
export async function withSpan<T>(name: string, fn: (span: Span) => Promise<T>, options: SpanOptions = {}): Promise<T> {
  if (!isTracingEnabled()) {
    return await fn(INVALID_SPAN);
  }

  return getTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    options.parent ?? context.active(),
    async (span) => {
      try {
        return await fn(span);
      } catch (error) {
        annotateFailure(span, error instanceof Error ? error : new Error(String(error)));
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

export { SpanKind, SpanStatusCode, type Span };
