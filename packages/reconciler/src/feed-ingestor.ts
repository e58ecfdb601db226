import { OTEL_ATTR, withSpan, type Logger } from '@app/logger';
import { FeedEnvelopeSchema, FeedItemSchema } from '@app/validation';

import { FeedMalformedError, FeedUnavailableError, errorMessage } from './errors.js';
import { normalize, sanitize } from './normalizer.js';
import type { FeedResponse, FeedTransport } from './ports.js';

export type FeedRecord = Readonly<{
  externalId: string | null;
  /** Sanitized raw SKU; empty when the feed row carried none. */
  sku: string;
  barcode: string | null;
  brand: string | null;
  rawQuantity: number;
  normalizedSku: string | null;
  normalizedBarcode: string | null;
}>;

export type FeedIndex = Readonly<{
  bySku: ReadonlyMap<string, FeedRecord>;
  byBarcode: ReadonlyMap<string, FeedRecord>;
}>;

export type FeedIngestResult = Readonly<{
  index: FeedIndex;
  totalRows: number;
  acceptedRows: number;
  skippedRows: number;
  duplicateSkus: number;
  duplicateBarcodes: number;
}>;

function nullable(value: string): string | null {
  return value ? value : null;
}

/**
 * Builds both lookup indexes from the envelope's `data` array. Rows that do not validate are
 * skipped and counted. Later rows overwrite earlier ones on the same key.
 */
export function buildFeedIndex(rows: readonly unknown[]): FeedIngestResult {
  const bySku = new Map<string, FeedRecord>();
  const byBarcode = new Map<string, FeedRecord>();
  let acceptedRows = 0;
  let skippedRows = 0;
  let duplicateSkus = 0;
  let duplicateBarcodes = 0;

  for (const row of rows) {
    const parsed = FeedItemSchema.safeParse(row);
    if (!parsed.success) {
      skippedRows += 1;
      continue;
    }

    const item = parsed.data;
    const sku = sanitize(item.sku);
    const barcode = sanitize(item.barcode);
    const record: FeedRecord = {
      externalId: nullable(sanitize(item.itemNumber)),
      sku,
      barcode: nullable(barcode),
      brand: nullable(sanitize(item.brand)),
      rawQuantity: item.southbayStock,
      normalizedSku: normalize(sku),
      normalizedBarcode: normalize(barcode),
    };

    if (record.normalizedSku) {
      if (bySku.has(record.normalizedSku)) duplicateSkus += 1;
      bySku.set(record.normalizedSku, record);
    }
    if (record.normalizedBarcode) {
      if (byBarcode.has(record.normalizedBarcode)) duplicateBarcodes += 1;
      byBarcode.set(record.normalizedBarcode, record);
    }
    acceptedRows += 1;
  }

  return {
    index: { bySku, byBarcode },
    totalRows: rows.length,
    acceptedRows,
    skippedRows,
    duplicateSkus,
    duplicateBarcodes,
  };
}

export function parseFeedBody(body: string): unknown[] {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new FeedMalformedError('Feed response is not valid JSON', { cause: error });
  }

  const envelope = FeedEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new FeedMalformedError('Feed envelope lacks success=true or a data array');
  }
  return envelope.data.data;
}

export async function ingestFeed(params: {
  transport: FeedTransport;
  logger: Logger;
  signal?: AbortSignal;
}): Promise<FeedIngestResult> {
  const { transport, logger } = params;

  return withSpan('reconcile.feed.ingest', {}, async (span) => {
    let response: FeedResponse;
    try {
      response = await transport.fetch(params.signal);
    } catch (error) {
      throw new FeedUnavailableError(`Feed request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FeedUnavailableError(`Feed responded with HTTP ${response.status}`, {
        status: response.status,
      });
    }

    const rows = parseFeedBody(response.body);
    const result = buildFeedIndex(rows);
    span.setAttribute(OTEL_ATTR.FEED_RECORDS, result.acceptedRows);

    if (result.duplicateSkus > 0 || result.duplicateBarcodes > 0) {
      logger.warn(
        { duplicateSkus: result.duplicateSkus, duplicateBarcodes: result.duplicateBarcodes },
        'Feed contains duplicate identifiers; last row wins'
      );
    }
    if (result.skippedRows > 0) {
      logger.warn({ skippedRows: result.skippedRows }, 'Skipped malformed feed rows');
    }

    logger.info(
      {
        totalRows: result.totalRows,
        acceptedRows: result.acceptedRows,
        skusIndexed: result.index.bySku.size,
        barcodesIndexed: result.index.byBarcode.size,
      },
      'Feed ingested'
    );

    return result;
  });
}
