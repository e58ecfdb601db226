export type RedactionMode = 'development' | 'staging' | 'production' | 'test';

const SENSITIVE_KEY_REGEX =
  /(password|secret|token|authorization|cookie|signature|api[_-]?key|database[_-]?url|redis[_-]?url)/i;

const EMAIL_KEY_REGEX = /(email|recipient)/i;

export function redactDeep(value: unknown, mode: RedactionMode): unknown {
  return redactValue(value, mode, undefined);
}

function redactValue(value: unknown, mode: RedactionMode, key: string | undefined): unknown {
  if (value == null) return value;

  if (typeof value === 'string') {
    if (key && SENSITIVE_KEY_REGEX.test(key)) return '[REDACTED]';
    if (key && EMAIL_KEY_REGEX.test(key)) return maskEmail(value);
    return value;
  }

  if (typeof value !== 'object') return value;

  if (value instanceof Error) {
    const out: Record<string, unknown> = {
      name: value.name,
      message: value.message,
    };
    const code = (value as { code?: unknown }).code;
    if (typeof code === 'string') out['code'] = code;
    if (typeof value.stack === 'string') out['stack'] = truncateStack(value.stack, mode);
    if (value.cause !== undefined) out['cause'] = redactValue(value.cause, mode, 'cause');
    return out;
  }

  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, mode, key));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (k === 'stack' && typeof v === 'string') {
      out[k] = truncateStack(v, mode);
      continue;
    }
    out[k] = redactValue(v, mode, k);
  }
  return out;
}

function truncateStack(stack: string, mode: RedactionMode): string {
  if (mode !== 'production') return stack;
  return stack.split('\n').slice(0, 3).join('\n');
}

/**
 * `jane.doe@example.com` -> `j***@***.com`
 */
export function maskEmail(input: string): string {
  const match = /^([^@\s]+)@([^@\s]+)$/.exec(input.trim());
  if (!match) return input;
  const local = match[1] ?? '';
  const domain = match[2] ?? '';
  const tld = domain.split('.').pop() ?? 'com';
  return `${local.slice(0, 1) || 'x'}***@***.${tld}`;
}
