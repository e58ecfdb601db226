import type { Logger } from '@app/logger';
import type { ReconcileOrchestrator, RunStore, SettingsStore } from '@app/reconciler';
import { ReconcileSettingsUpdateSchema } from '@app/validation';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';

import { sendError, sendValidationError, successEnvelope } from '../http/envelope.js';

export type ManualRunResult = Readonly<{
  jobId: string;
  alreadyQueued: boolean;
}>;

/** Enqueues manual runs; a second request while one is pending returns the pending job. */
export interface RunTrigger {
  enqueueManualRun(): Promise<ManualRunResult>;
}

export type ReconcileRoutesOptions = Readonly<{
  logger: Logger;
  orchestrator: Pick<ReconcileOrchestrator, 'overview'>;
  runs: Pick<RunStore, 'latestRun'>;
  settings: SettingsStore;
  trigger: RunTrigger;
  exposeInternalErrors: boolean;
}>;

export const reconcileRoutes: FastifyPluginAsync<ReconcileRoutesOptions> = (
  server: FastifyInstance,
  options
) => {
  const { logger, orchestrator, runs, settings, trigger, exposeInternalErrors } = options;

  server.post('/reconcile/run', async (request, reply) => {
    try {
      const result = await trigger.enqueueManualRun();
      logger.info({ requestId: request.id, ...result }, 'Manual reconciliation requested');
      return await reply.status(202).send(successEnvelope(request.id, result));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to enqueue manual run');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.get('/reconcile/runs/latest', async (request, reply) => {
    try {
      const latest = await runs.latestRun();
      return await reply.send(successEnvelope(request.id, latest));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to load latest run');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.get('/reconcile/overview', async (request, reply) => {
    try {
      const overview = await orchestrator.overview();
      return await reply.send(successEnvelope(request.id, overview));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to build overview');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.get('/reconcile/settings', async (request, reply) => {
    try {
      return await reply.send(successEnvelope(request.id, await settings.load()));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to load settings');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  server.put('/reconcile/settings', async (request, reply) => {
    const parsed = ReconcileSettingsUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(request, reply, parsed.error);
    }

    try {
      const saved = await settings.save(parsed.data);
      logger.info(
        { requestId: request.id, changed: Object.keys(parsed.data) },
        'Reconcile settings updated'
      );
      return await reply.send(successEnvelope(request.id, saved));
    } catch (error) {
      logger.error({ requestId: request.id, error }, 'Failed to save settings');
      return sendError(request, reply, error, exposeInternalErrors);
    }
  });

  return Promise.resolve();
};
