import { trace } from '@opentelemetry/api';
import pino, { type Logger as PinoLogger } from 'pino';

import { redactDeep, type RedactionMode } from './redaction.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogContext = Record<string, unknown>;

export type Logger = Readonly<{
  debug: (context: LogContext, message: string) => void;
  info: (context: LogContext, message: string) => void;
  warn: (context: LogContext, message: string) => void;
  error: (context: LogContext, message: string) => void;
  fatal: (context: LogContext, message: string) => void;
  child: (baseContext: LogContext) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Destination stream; defaults to stdout. */
  destination?: pino.DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = createPinoLogger(options);
  return wrap(pinoLogger, options.env, {});
}

/**
 * Logger that drops everything. Used by tests and by library callers that do not log.
 */
export function createNoopLogger(): Logger {
  const noop = (): void => undefined;
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
  };
  return logger;
}

function createPinoLogger(options: CreateLoggerOptions): PinoLogger {
  const pinoOptions: pino.LoggerOptions = {
    level: options.level,
    messageKey: 'message',
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service: options.service,
      env: options.env,
      version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
    },
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie', '*.secret', '*.webhook_secret'],
      censor: '[REDACTED]',
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

function wrap(pinoLogger: PinoLogger, mode: RedactionMode, baseContext: LogContext): Logger {
  const emit = (level: LogLevel, context: LogContext, message: string): void => {
    const merged = toSnakeCaseDeep({ ...baseContext, ...context, ...activeSpanIds() });
    const payload = redactDeep(merged, mode);
    pinoLogger[level](isRecord(payload) ? payload : { payload }, message);
  };

  return {
    debug: (context, message) => emit('debug', context, message),
    info: (context, message) => emit('info', context, message),
    warn: (context, message) => emit('warn', context, message),
    error: (context, message) => emit('error', context, message),
    fatal: (context, message) => emit('fatal', context, message),
    child: (ctx) => wrap(pinoLogger, mode, { ...baseContext, ...ctx }),
  };
}

function activeSpanIds(): LogContext {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext) return {};
  return {
    trace_id: spanContext.traceId,
    span_id: spanContext.spanId,
  };
}

function isRecord(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  if (value instanceof Error || value instanceof Date) return value;
  if (!isRecord(value)) return value;

  const out: LogContext = {};
  for (const [key, val] of Object.entries(value)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

export function toSnakeKey(key: string): string {
  // Already snake_case.
  if (key.includes('_')) return key.toLowerCase();

  return key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2')
    .toLowerCase();
}
