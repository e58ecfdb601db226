export type ReconcileErrorCode =
  | 'FEED_UNAVAILABLE'
  | 'FEED_MALFORMED'
  | 'BATCH_PROCESSING'
  | 'ITEM_LOOKUP'
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND';

export class ReconcileError extends Error {
  public readonly code: ReconcileErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: ReconcileErrorCode;
    message: string;
    cause?: unknown;
    details?: Record<string, unknown>;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ReconcileError';
    this.code = options.code;
    if (options.details) {
      this.details = options.details;
    }
  }
}

/** Transport or timeout failure while fetching the feed. */
export class FeedUnavailableError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super({
      code: 'FEED_UNAVAILABLE',
      message,
      cause: options?.cause,
      ...(options?.status !== undefined ? { details: { status: options.status } } : {}),
    });
    this.name = 'FeedUnavailableError';
  }
}

/** The feed answered, but not with a usable envelope. */
export class FeedMalformedError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super({ code: 'FEED_MALFORMED', message, cause: options?.cause });
    this.name = 'FeedMalformedError';
  }
}

export class BatchProcessingError extends ReconcileError {
  public readonly batchIndex: number;
  public readonly itemIds: readonly string[];

  constructor(options: { batchIndex: number; itemIds: readonly string[]; cause: unknown }) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super({
      code: 'BATCH_PROCESSING',
      message: `Batch ${options.batchIndex} failed: ${reason}`,
      cause: options.cause,
    });
    this.name = 'BatchProcessingError';
    this.batchIndex = options.batchIndex;
    this.itemIds = options.itemIds;
  }
}

/** Reference data the store needs for a write (the item row itself, its stock location) is gone. */
export class ItemLookupError extends ReconcileError {
  public readonly itemId: string;

  constructor(itemId: string, message: string) {
    super({ code: 'ITEM_LOOKUP', message, details: { itemId } });
    this.name = 'ItemLookupError';
    this.itemId = itemId;
  }
}

export class InvalidTransitionError extends ReconcileError {
  constructor(from: string, to: string) {
    super({
      code: 'INVALID_TRANSITION',
      message: `Invalid missing product transition: ${from} -> ${to}`,
      details: { from, to },
    });
    this.name = 'InvalidTransitionError';
  }
}

export class NotFoundError extends ReconcileError {
  constructor(entity: string, id: string) {
    super({ code: 'NOT_FOUND', message: `${entity} not found: ${id}`, details: { id } });
    this.name = 'NotFoundError';
  }
}

export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
