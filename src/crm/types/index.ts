// ============================================================================
// CRM Types — record shapes and field mapping
// ============================================================================

import { z } from 'zod';
import type { IdentityField } from '../../store/types.js';

// ============================================================================
// Field mapping — identity attribute → CRM field API name
// ============================================================================

export const CRM_FIELDS: Readonly<Record<IdentityField, string>> = {
  firstName: 'First_Name',
  lastName: 'Last_Name',
  email: 'Email',
  phone: 'Phone',
};

export const MODIFIED_TIME_FIELD = 'Modified_Time';

// ============================================================================
// Domain shapes
// ============================================================================

export interface CrmRecord {
  id: string;
  /** String-valued fields by API name; null when the CRM holds no value */
  fields: Record<string, string | null>;
  /** Last modification time reported by the CRM, when present and parseable */
  modifiedTime: Date | null;
}

export interface CrmWriteResult {
  id: string;
  modifiedTime: Date | null;
}

// ============================================================================
// Wire schemas
// ============================================================================

export const rawRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
  })
  .passthrough();

export const recordListSchema = z.object({
  data: z.array(rawRecordSchema).default([]),
});

export const writeResponseSchema = z.object({
  data: z
    .array(
      z.object({
        code: z.string().optional(),
        status: z.string().optional(),
        message: z.string().optional(),
        details: z
          .object({
            id: z.union([z.string(), z.number()]).transform(String).optional(),
            Modified_Time: z.string().optional(),
          })
          .passthrough()
          .optional(),
      }),
    )
    .min(1),
});

export function parseCrmTime(value: unknown): Date | null {
  if (typeof value !== 'string' || value.length === 0) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function toCrmRecord(raw: z.infer<typeof rawRecordSchema>): CrmRecord {
  const fields: Record<string, string | null> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'id') continue;
    if (typeof value === 'string') fields[key] = value;
    else if (value === null) fields[key] = null;
  }
  return {
    id: raw.id,
    fields,
    modifiedTime: parseCrmTime(raw[MODIFIED_TIME_FIELD]),
  };
}
