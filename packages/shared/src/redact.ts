/**
 * Sensitive data masking for log output.
 *
 * Values stored under a sensitive key are replaced wholesale; free text is
 * scanned for `token=<value>` pairs (value runs up to the next `;`).
 */

export const MASK = '******';

const SENSITIVE_KEYS = new Set([
  'credentials',
  'authorization',
  'token',
  'password',
  'access_token',
  'api_key',
  'apikey',
  'x-api-key',
]);

const TOKEN_PATTERN = /token=([^;]+)/g;

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

export function redactText(text: string): string {
  return text.replace(TOKEN_PATTERN, `token=${MASK}`);
}

/**
 * Return a copy of `value` with sensitive data masked.
 * Objects and arrays are walked recursively; other values pass through.
 */
export function redactSensitive<T>(value: T): T;
export function redactSensitive(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactText(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitive(item));
  }
  if (value instanceof Date || value === null || typeof value !== 'object') {
    return value;
  }

  const masked: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    masked[key] = isSensitiveKey(key) ? MASK : redactSensitive(entry);
  }
  return masked;
}
