/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry span helpers.
 */

export {
  Logger,
  getLogger,
  setLogger,
  loggerOptionsFor,
  LOG_LEVEL_NAMES,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withSpan,
  withDbSpan,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
} from './otel.ts';
