/**
 * Identifier normalization shared by the feed and the inventory side.
 *
 * Both sides go through the same functions so that `"ABC-123"`, `"abc123"` and `"ABC 123"`
 * meet on the same key.
 */

export type RawIdentifier = string | number | null | undefined;

const PLACEHOLDERS: ReadonlySet<string> = new Set(['none', 'null', 'n/a', 'na']);

export function sanitize(raw: RawIdentifier): string {
  if (raw === null || raw === undefined) return '';
  const value = String(raw).trim();
  if (!value) return '';
  if (PLACEHOLDERS.has(value.toLowerCase())) return '';
  return value;
}

export function normalize(raw: RawIdentifier): string | null {
  const sanitized = sanitize(raw);
  if (!sanitized) return null;
  const stripped = sanitized.replace(/[^\p{L}\p{N}]+/gu, '');
  return stripped ? stripped.toUpperCase() : null;
}

export function isValidIdentifier(raw: RawIdentifier): boolean {
  return sanitize(raw) !== '';
}

/**
 * Comparison key for the missing-product guard. No placeholder detection; ASCII alphanumerics
 * only, matching the store-side SQL expression.
 */
export function normalizeRelaxedSku(raw: string | null | undefined): string {
  if (!raw) return '';
  return raw.replace(/[^0-9A-Za-z]+/g, '').toUpperCase();
}
