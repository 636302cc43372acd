/**
 * Contact value normalisation.
 *
 * Matching is exact on the normalised form, so the same address written with
 * different case or the same number written with spaces and dashes resolves
 * to one identity.
 */

export function normalizeEmail(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim().toLowerCase();
  return trimmed.includes('@') ? trimmed : null;
}

/** Keeps digits and a single leading '+'. "+1 (555) 010-2000" → "+15550102000" */
export function normalizePhone(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (digits.length === 0) return null;
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

export function normalizeName(value: string | null | undefined): string | null {
  if (typeof value !== 'string') return null;
  const collapsed = value.trim().replace(/\s+/g, ' ');
  return collapsed.length > 0 ? collapsed : null;
}
