import { isReconcileError } from '@app/reconciler';
import type { ApiErrorCode, ApiErrorResponse, ApiSuccessResponse } from '@app/types';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';

function nowIso(): string {
  return new Date().toISOString();
}

export function successEnvelope<T>(requestId: string, data: T): ApiSuccessResponse<T> {
  return {
    success: true,
    data,
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  };
}

export function errorEnvelope(
  requestId: string,
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details ? { details } : {}),
    },
    meta: {
      request_id: requestId,
      timestamp: nowIso(),
    },
  };
}

export function sendValidationError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: ZodError
): FastifyReply {
  return reply.status(400).send(
    errorEnvelope(request.id, 'BAD_REQUEST', error.issues[0]?.message ?? 'Invalid request', {
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    })
  );
}

/** Maps engine errors to HTTP statuses; anything unrecognized is a 500. */
export function errorStatus(error: unknown): { status: number; code: ApiErrorCode } {
  if (isReconcileError(error)) {
    if (error.code === 'NOT_FOUND') return { status: 404, code: 'NOT_FOUND' };
    if (error.code === 'INVALID_TRANSITION') return { status: 409, code: 'INVALID_TRANSITION' };
  }
  return { status: 500, code: 'INTERNAL_ERROR' };
}

export function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  exposeInternal: boolean
): FastifyReply {
  const { status, code } = errorStatus(error);
  const message =
    status >= 500 && !exposeInternal
      ? 'Internal Server Error'
      : error instanceof Error
        ? error.message
        : String(error);
  return reply.status(status).send(errorEnvelope(request.id, code, message));
}
