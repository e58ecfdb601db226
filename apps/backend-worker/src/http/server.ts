import { randomUUID } from 'node:crypto';

import { setRequestIdAttribute, type Logger } from '@app/logger';
import Fastify, { type FastifyInstance } from 'fastify';

import {
  missingProductRoutes,
  type MissingProductRoutesOptions,
} from '../routes/missing-products.js';
import { reconcileRoutes, type ReconcileRoutesOptions } from '../routes/reconcile.js';

import { errorEnvelope } from './envelope.js';

/** Named dependency probes for /health/ready; each resolves false when unhealthy. */
export type ReadinessChecks = Readonly<Record<string, () => Promise<boolean>>>;

export type BuildServerOptions = Readonly<{
  logger: Logger;
  /** Error messages of 5xx responses are replaced unless this is set. */
  exposeInternalErrors: boolean;
  readiness: ReadinessChecks;
  reconcile: Omit<ReconcileRoutesOptions, 'logger' | 'exposeInternalErrors'>;
  missingProducts: Omit<MissingProductRoutesOptions, 'logger' | 'exposeInternalErrors'>;
}>;

function withoutQuery(url: string): string {
  const q = url.indexOf('?');
  return q === -1 ? url : url.slice(0, q);
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout`)), timeoutMs);
    timer.unref();
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function statusCodeOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 600) return statusCode;
  }
  return 500;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { logger, exposeInternalErrors } = options;

  const server = Fastify({
    trustProxy: true,
    bodyLimit: 1 * 1024 * 1024,
    connectionTimeout: 10_000,
    requestTimeout: 15_000,
    requestIdHeader: 'x-request-id',
    genReqId(req) {
      const header = req.headers['x-request-id'];
      if (typeof header === 'string' && header.trim()) return header.trim();
      return randomUUID();
    },
  });

  server.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
    setRequestIdAttribute(request.id);
    logger.debug(
      { requestId: request.id, method: request.method, path: withoutQuery(request.url) },
      'request received'
    );
  });

  server.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        requestId: request.id,
        method: request.method,
        path: withoutQuery(request.url),
        statusCode: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime),
      },
      'request completed'
    );
  });

  server.setErrorHandler(async (error, request, reply) => {
    logger.error({ requestId: request.id, error }, 'request failed');

    const statusCode = statusCodeOf(error);
    const code =
      statusCode === 404 ? 'NOT_FOUND' : statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
    const message =
      statusCode >= 500 && !exposeInternalErrors ? 'Internal Server Error' : error.message;

    return reply.status(statusCode).send(errorEnvelope(request.id, code, message));
  });

  server.setNotFoundHandler(async (request, reply) => {
    const route = `${request.method} ${withoutQuery(request.url)}`;
    return reply.status(404).send(errorEnvelope(request.id, 'NOT_FOUND', `Route ${route} not found`));
  });

  server.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ status: 'alive' });
  });

  server.get('/health/ready', async (_request, reply) => {
    const checkTimeoutMs = 1500;
    const entries = await Promise.all(
      Object.entries(options.readiness).map(async ([name, check]) => {
        const ok = await withTimeout(check(), checkTimeoutMs, `${name} check`).catch(() => false);
        return [name, ok ? 'ok' : 'fail'] as const;
      })
    );
    const checks = Object.fromEntries(entries);
    const ready = entries.every(([, status]) => status === 'ok');
    return reply.status(ready ? 200 : 503).send({ status: ready ? 'ready' : 'not_ready', checks });
  });

  await server.register(reconcileRoutes, { ...options.reconcile, logger, exposeInternalErrors });
  await server.register(missingProductRoutes, {
    ...options.missingProducts,
    logger,
    exposeInternalErrors,
  });

  return server;
}
