import { Redis as IORedis, type Redis, type RedisOptions } from 'ioredis';

export type RedisConnection = Redis;

export type RedisEndpoint = Readonly<{
  host: string;
  port: number;
  db: number;
  username?: string;
  password?: string;
  tls?: Record<string, never>;
}>;

/** Splits a redis:// or rediss:// URL into ioredis connection fields. */
export function redisOptionsFromUrl(redisUrl: string): RedisEndpoint {
  const trimmed = redisUrl.trim();
  if (!trimmed) {
    throw new Error('Missing required config value: REDIS_URL');
  }
  const url = new URL(trimmed);
  if (url.protocol !== 'redis:' && url.protocol !== 'rediss:') {
    throw new Error(`Invalid Redis URL protocol: ${url.protocol}`);
  }

  const dbSegment = url.pathname.replace(/^\//, '');
  const db = dbSegment ? Number(dbSegment) : 0;
  if (!Number.isInteger(db) || db < 0) {
    throw new Error(`Invalid Redis database index: ${dbSegment}`);
  }

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 6379,
    db,
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
  };
}

export type CreateRedisConnectionOptions = Readonly<{
  redisUrl: string;
  redisOptions?: RedisOptions;
}>;

export function createRedisConnection(options: CreateRedisConnectionOptions): RedisConnection {
  const { redisUrl, redisOptions } = options;
  return new IORedis(redisUrl, {
    enableReadyCheck: true,
    connectTimeout: 10_000,
    retryStrategy: (times) => Math.min(times * 50, 2_000),
    maxRetriesPerRequest: null,
    ...redisOptions,
  });
}
