/**
 * Telemetry & Observability
 *
 * Cross-cutting observability concerns.
 *
 * Responsibilities:
 * - Structured logging (JSON or pretty)
 * - Child loggers carrying component context
 * - OpenTelemetry span annotation
 */

export {
  Logger,
  getLogger,
  setLogger,
  parseLogLevel,
  serializeError,
  formatPretty,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type LogSink,
  type SerializedError,
} from './logger.ts';

export {
  isTracingEnabled,
  currentSpan,
  getTracer,
  annotateRoute,
  annotateFailure,
  withSpan,
  SpanKind,
  SpanStatusCode,
  TRACER_NAME,
  DISPATCH_STAGE_ATTRIBUTE,
  type SpanOptions,
  type Span,
} from './otel.ts';
