/**
 * Log scrubber: mask secrets, client names and credentials inside Postgres connection strings.
 */

const SECRET_KEYS = /^(password|passwd|pwd|secret)$/i;
const NAME_KEYS = /^(client_?name|last_?name|first_?name|middle_?name)$/i;
const CONNECTION_STRING_REG = /(postgres(?:ql)?:\/\/[^:\s/@]+:)([^@\s]+)(@)/gi;

const MASK_SECRET = '[REDACTED]';
const MASK_NAME = '[NAME_REDACTED]';

/** Mask the password part of postgres:// URLs in a string. */
export function scrubConnectionString(value: string): string {
  return value.replace(CONNECTION_STRING_REG, `$1${MASK_SECRET}$3`);
}

/** Mask a single value by key name (password, client name fields). */
export function scrubValue(key: string, value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (SECRET_KEYS.test(key)) return MASK_SECRET;
  if (NAME_KEYS.test(key)) return MASK_NAME;
  return typeof value === 'string' ? scrubString(value) : value;
}

/** Recursively scrub an object: mask keyed fields, then connection strings in string values. */
export function scrubObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (typeof obj === 'string') return scrubString(obj);
  if (typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map((item) => scrubObject(item));
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    const masked = scrubValue(k, v);
    out[k] = masked !== null && typeof masked === 'object' ? scrubObject(masked) : masked;
  }
  return out;
}

export function scrubString(str: string): string {
  return scrubConnectionString(str);
}
