/**
 * Field digests for change detection.
 *
 * A SyncLink stores the SHA-256 of each field's last known remote value. The
 * remote side has changed a field when the digest of its current value no
 * longer matches. Null values have no digest.
 */

import { createHash } from 'node:crypto';

export function fieldDigest(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

/** Digest map for every non-null value */
export function digestFields(values: Record<string, string | null>): Record<string, string> {
  const digests: Record<string, string> = {};
  for (const [field, value] of Object.entries(values)) {
    const digest = fieldDigest(value);
    if (digest !== null) digests[field] = digest;
  }
  return digests;
}
