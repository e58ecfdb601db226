import type { FailureIsolation, ReconcileSettings } from '@app/types';

import type { AppEnv } from './env.js';

export const DEFAULT_ALLOWED_PREFIXES = 'GN,PD,PB,PP,LVL,LP,PW';
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_MISSING_RETENTION_HOURS = 24;

/**
 * Splits a comma-separated prefix list. Empty segments are dropped and order is kept;
 * duplicates are collapsed.
 */
export function parsePrefixList(csv: string | null | undefined): string[] {
  if (!csv) return [];
  const seen = new Set<string>();
  for (const part of csv.split(',')) {
    const trimmed = part.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
}

export function formatPrefixList(prefixes: readonly string[]): string {
  return prefixes.join(',');
}

export function parseFailureIsolation(value: string | null | undefined): FailureIsolation {
  const normalized = (value ?? 'batch').trim();
  if (normalized === 'batch' || normalized === 'item') return normalized;
  throw new Error(`Invalid failure isolation: ${normalized}`);
}

export function defaultReconcileSettings(
  env: Pick<AppEnv, 'reportRecipient' | 'reportWebhookUrl'>
): ReconcileSettings {
  return {
    prefixFilterEnabled: false,
    allowedPrefixes: parsePrefixList(DEFAULT_ALLOWED_PREFIXES),
    notificationsEnabled: env.reportWebhookUrl !== null && env.reportRecipient !== null,
    recipientEmail: env.reportRecipient,
    batchSize: DEFAULT_BATCH_SIZE,
    isolation: 'batch',
    missingRetentionHours: DEFAULT_MISSING_RETENTION_HOURS,
  };
}
