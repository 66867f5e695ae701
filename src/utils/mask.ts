export const REDACTION_MARKER = '******';

const SENSITIVE_KEY_PARTS = [
  'password',
  'secret',
  'key',
  'token',
  'private_key',
  'access_key',
  'secret_key',
  'aws_secret_access_key',
] as const;

/**
 * Whether a key name counts as sensitive (case-insensitive substring match).
 */
export function isSensitiveKey(name: string): boolean {
  const lower = name.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function maskValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(maskValue);
  }
  if (isPlainRecord(value)) {
    return maskSensitive(value);
  }
  return value;
}

/**
 * Return a copy of `data` with string values under sensitive keys replaced by
 * the redaction marker. Nested mappings are masked recursively; other leaves
 * pass through unchanged.
 */
export function maskSensitive<T extends Record<string, unknown>>(data: T): T;
export function maskSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && isSensitiveKey(key)) {
      masked[key] = REDACTION_MARKER;
    } else {
      masked[key] = maskValue(value);
    }
  }
  return masked;
}
