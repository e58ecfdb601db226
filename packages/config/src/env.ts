import { CronExpressionParser } from 'cron-parser';

export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type AppEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'fatal';
  port: number;

  databaseUrl: string;
  redisUrl: string;

  feedUrl: URL;
  feedTimeoutMs: number;

  reconcileCron: string;
  reconcileTimezone: string;
  batchDelayMs: number;
  largeBatchDelayMs: number;

  reportWebhookUrl: URL | null;
  reportWebhookSecret: string | null;
  reportRecipient: string | null;
}>;

type EnvSource = Record<string, string | undefined>;

function requiredString(env: EnvSource, key: string): string {
  const value = env[key];
  if (!value?.trim()) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new Error(`Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): AppEnv['logLevel'] {
  const normalized = (value ?? 'info').trim();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error' ||
    normalized === 'fatal'
  ) {
    return normalized;
  }
  throw new Error(`Invalid LOG_LEVEL: ${normalized}`);
}

function parsePort(value: string | undefined): number {
  const raw = (value ?? '8080').trim();
  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }
  return port;
}

function parseNonNegativeInt(env: EnvSource, key: string, fallback: number): number {
  const raw = optionalString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid ${key}: expected non-negative integer, got ${raw}`);
  }
  return value;
}

function parseHttpUrl(key: string, value: string): URL {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid ${key} protocol: ${url.protocol}`);
  }
  return url;
}

function parseRedisUrl(env: EnvSource, key: string): string {
  const value = requiredString(env, key);
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid URL in ${key}: ${value}`);
  }
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Invalid Redis URL protocol for ${key}: ${url.protocol}`);
  }
  return value;
}

function parseCron(env: EnvSource, timezone: string): string {
  const cron = optionalString(env, 'RECONCILE_CRON') ?? '0 * * * *';
  try {
    CronExpressionParser.parse(cron, { tz: timezone });
  } catch {
    throw new Error(`Invalid RECONCILE_CRON: ${cron}`);
  }
  return cron;
}

function parseRecipient(env: EnvSource): string | null {
  const value = optionalString(env, 'RECONCILE_REPORT_RECIPIENT');
  if (value === undefined) return null;
  if (!/^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(value)) {
    throw new Error('Invalid RECONCILE_REPORT_RECIPIENT: expected an email address');
  }
  return value;
}

export function loadEnv(env: EnvSource = process.env): AppEnv {
  const nodeEnv = parseNodeEnv(env['NODE_ENV']);
  const logLevel = parseLogLevel(env['LOG_LEVEL']);
  const port = parsePort(env['PORT']);

  const databaseUrl = requiredString(env, 'DATABASE_URL');
  const redisUrl = parseRedisUrl(env, 'REDIS_URL');

  const feedUrl = parseHttpUrl('FEED_URL', requiredString(env, 'FEED_URL'));
  const feedTimeoutMs = parseNonNegativeInt(env, 'FEED_TIMEOUT_MS', 30_000);
  if (feedTimeoutMs === 0) {
    throw new Error('Invalid FEED_TIMEOUT_MS: must be greater than 0');
  }

  const reconcileTimezone = optionalString(env, 'RECONCILE_TIMEZONE') ?? 'UTC';
  const reconcileCron = parseCron(env, reconcileTimezone);
  const batchDelayMs = parseNonNegativeInt(env, 'RECONCILE_BATCH_DELAY_MS', 1_000);
  const largeBatchDelayMs = parseNonNegativeInt(env, 'RECONCILE_LARGE_BATCH_DELAY_MS', 2_000);

  const webhookRaw = optionalString(env, 'RECONCILE_REPORT_WEBHOOK_URL');
  const reportWebhookUrl = webhookRaw
    ? parseHttpUrl('RECONCILE_REPORT_WEBHOOK_URL', webhookRaw)
    : null;
  const reportWebhookSecret = optionalString(env, 'RECONCILE_REPORT_WEBHOOK_SECRET') ?? null;
  const reportRecipient = parseRecipient(env);

  return {
    nodeEnv,
    logLevel,
    port,
    databaseUrl,
    redisUrl,
    feedUrl,
    feedTimeoutMs,
    reconcileCron,
    reconcileTimezone,
    batchDelayMs,
    largeBatchDelayMs,
    reportWebhookUrl,
    reportWebhookSecret,
    reportRecipient,
  };
}
