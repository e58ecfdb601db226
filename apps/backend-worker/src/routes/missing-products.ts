import type { Logger } from '@app/logger';
import type { MissingProductStore, ReconcileOrchestrator } from '@app/reconciler';
import { MissingProductListQuerySchema, MissingProductParamsSchema } from '@app/validation';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { sendError, sendValidationError, successEnvelope } from '../http/envelope.js';

export type MissingProductRoutesOptions = Readonly<{
  logger: Logger;
  orchestrator: Pick<
    ReconcileOrchestrator,
    'purgeMissing' | 'createItemFromMissing' | 'markMissingIgnored' | 'markMissingCreated'
  >;
  missing: Pick<MissingProductStore, 'list'>;
  exposeInternalErrors: boolean;
}>;

const MarkCreatedBodySchema = z
  .object({ note: z.string().trim().min(1).max(500).optional() })
  .strict()
  .nullish();

export const missingProductRoutes: FastifyPluginAsync<MissingProductRoutesOptions> = (
  server: FastifyInstance,
  options
) => {
  const { logger, orchestrator, missing, exposeInternalErrors } = options;

  server.get('/reconcile/missing-products', async (request, reply) => {
    const parsed = MissingProductListQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return sendValidationError(request, reply, parsed.error);
    }

    try {
      const { status, page, limit } = parsed.data;
      const result = await missing.list({ ...(status ? { status } : {}), page, limit });
      return await reply.send(
        successEnvelope(request.id, { items: result.items, page, limit, total: result.total })
      );
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to list missing products');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.post('/reconcile/missing-products/purge', async (request, reply) => {
    try {
      const purged = await orchestrator.purgeMissing();
      return await reply.send(successEnvelope(request.id, { purged }));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to purge missing products');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.post('/reconcile/missing-products/:id/create-item', async (request, reply) => {
    const params = MissingProductParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, params.error);
    }

    try {
      const created = await orchestrator.createItemFromMissing(params.data.id);
      return await reply.status(201).send(successEnvelope(request.id, created));
    } catch (error) {
      logger.warn({ requestId: request.id, id: params.data.id, error }, 'Create item failed');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.post('/reconcile/missing-products/:id/mark-created', async (request, reply) => {
    const params = MissingProductParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, params.error);
    }
    const body = MarkCreatedBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(request, reply, body.error);
    }

    try {
      const record = await orchestrator.markMissingCreated(params.data.id, body.data?.note);
      return await reply.send(successEnvelope(request.id, record));
    } catch (error) {
      logger.warn({ requestId: request.id, id: params.data.id, error }, 'Mark created failed');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.post('/reconcile/missing-products/:id/ignore', async (request, reply) => {
    const params = MissingProductParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, params.error);
    }

    try {
      const record = await orchestrator.markMissingIgnored(params.data.id);
      return await reply.send(successEnvelope(request.id, record));
    } catch (error) {
      logger.warn({ requestId: request.id, id: params.data.id, error }, 'Ignore failed');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  return Promise.resolve();
};
