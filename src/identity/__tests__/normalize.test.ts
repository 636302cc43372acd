import { describe, it, expect } from 'vitest';
import { normalizeEmail, normalizeName, normalizePhone } from '../normalize.js';

describe('normalizeEmail', () => {
  it('trims and lowercases', () => {
    expect(normalizeEmail('  Ada.Park@Example.COM ')).toBe('ada.park@example.com');
  });

  it('rejects values without an @', () => {
    expect(normalizeEmail('not-an-email')).toBeNull();
    expect(normalizeEmail(null)).toBeNull();
  });
});

describe('normalizePhone', () => {
  it('keeps digits and a leading plus', () => {
    expect(normalizePhone('+1 (555) 010-2000')).toBe('+15550102000');
    expect(normalizePhone('555.010.2000')).toBe('5550102000');
  });

  it('returns null when no digits remain', () => {
    expect(normalizePhone(' - ')).toBeNull();
    expect(normalizePhone(undefined)).toBeNull();
  });
});

describe('normalizeName', () => {
  it('collapses inner whitespace', () => {
    expect(normalizeName('  Mary   Ann ')).toBe('Mary Ann');
    expect(normalizeName('   ')).toBeNull();
  });
});
