/**
 * PII Sanitization for Safe Logging
 *
 * Replaces contact details and credentials with '[REDACTED]' before anything
 * reaches the logs. Lead payloads carry names, emails, phone numbers and
 * sometimes addresses; webhook and token payloads can carry secrets.
 *
 * - Arrays are replaced with '[Array(N)]' summaries (never iterated into,
 *   because array elements could contain PII objects)
 * - Depth limit of 10 bounds recursion on deeply nested payloads
 */

/** Set of field names whose values must never appear in logs */
export const PII_FIELDS: ReadonlySet<string> = new Set([
  'email',
  'phone',
  'phoneNumber',
  'firstName',
  'lastName',
  'first_name',
  'last_name',
  'name',
  'from',
  'to',
  'from_number',
  'to_number',
  'caller',
  'address',
  'line1',
  'line2',
  'postCode',
  'ipAddress',
  'free_text',
  'freeText',
  'access_token',
  'refresh_token',
  'accessToken',
  'refreshToken',
  'client_secret',
  'authorization',
  'signature',
]);

const MAX_DEPTH = 10;
const REDACTED = '[REDACTED]';

/**
 * Recursively sanitize a value for safe logging.
 *
 * - Primitives pass through unchanged
 * - PII field values are replaced with '[REDACTED]'
 * - Arrays are replaced with '[Array(N)]' (never iterated)
 * - Objects deeper than MAX_DEPTH are replaced with '[Object]'
 */
export function sanitizeForLog(obj: unknown, depth = 0): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return `[Array(${obj.length})]`;
  }

  if (depth >= MAX_DEPTH) {
    return '[Object]';
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.has(key)) {
      result[key] = REDACTED;
    } else {
      result[key] = sanitizeForLog(value, depth + 1);
    }
  }

  return result;
}
