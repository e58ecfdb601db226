export {
  createLogger,
  createNoopLogger,
  toSnakeCaseDeep,
  toSnakeKey,
  type CreateLoggerOptions,
  type LogContext,
  type LogLevel,
  type Logger,
} from './schema.js';
export { redactDeep, maskEmail, type RedactionMode } from './redaction.js';
export { withSpan, markSpanFailed, setRequestIdAttribute } from './otel-correlation.js';
export type { SpanAttributes } from './otel-correlation.js';
export { OTEL_ATTR, type OtelAttrKey } from './otel-attributes.js';
