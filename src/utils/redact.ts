export const REDACTED = '[REDACTED]';

export const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  'password',
  'hashed_password',
  'email',
  'nif',
  'receptor_nif',
  'emisor_nif',
  'username',
  'phone',
]);

/**
 * Returns a copy of `data` with every sensitive key (matched case-insensitively,
 * at any depth, inside arrays too) replaced by `[REDACTED]`. The input is not modified.
 */
export function redactPii(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(redactPii);
  if (data !== null && typeof data === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(data)) {
      out[k] = SENSITIVE_KEYS.has(k.toLowerCase()) ? REDACTED : redactPii(v);
    }
    return out;
  }
  return data;
}
