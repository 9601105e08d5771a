/**
 * Redact secrets from values before they reach the log.
 * Free-text journal notes are truncated, keys that look like credentials are masked.
 */

const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /apikey/i,
  /anon_?key/i,
  /key$/i,
  /secret/i,
  /email/i,
];

const MAX_STRING_LENGTH = 200;
const MAX_DEPTH = 4;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
}

function truncate(value: string): string {
  if (value.length > MAX_STRING_LENGTH) {
    return value.substring(0, MAX_STRING_LENGTH) + '...[truncated]';
  }
  return value;
}

export function sanitizeLogPayload(value: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (depth > MAX_DEPTH) {
    return '[Max Depth Reached]';
  }
  if (typeof value === 'string') {
    return truncate(value);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular Reference]';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
    return { name: value.name, message: truncate(value.message), ...(code ? { code } : {}) };
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => sanitizeLogPayload(item, depth + 1, seen));
    }
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeLogPayload(item, depth + 1, seen);
    }
    return result;
  } finally {
    seen.delete(value);
  }
}
