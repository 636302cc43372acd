import { describe, it, expect, vi } from 'vitest';
import { crmConfig, validateCrmConfig } from '../config.js';
import type { CrmConfig } from '../config.js';

function withOauth(oauth: Partial<CrmConfig['oauth']>): CrmConfig {
  return {
    ...crmConfig,
    oauth: {
      ...crmConfig.oauth,
      clientId: '',
      clientSecret: '',
      refreshToken: null,
      staticAccessToken: '',
      ...oauth,
    },
  };
}

describe('validateCrmConfig', () => {
  it('passes with a complete OAuth client', () => {
    expect(() =>
      validateCrmConfig(withOauth({ clientId: 'client-1', clientSecret: 'test-secret', refreshToken: 'refresh-1' })),
    ).not.toThrow();
  });

  it('lists every missing OAuth variable', () => {
    expect(() => validateCrmConfig(withOauth({ clientId: 'client-1' }))).toThrow(
      'CRM config incomplete. Missing environment variables:\n  - CRM_CLIENT_SECRET\n  - CRM_REFRESH_TOKEN',
    );
  });

  it('accepts a static token alone with a warning', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(() => validateCrmConfig(withOauth({ staticAccessToken: 'static-token' }))).not.toThrow();
    expect(warnSpy).toHaveBeenCalledWith('[CRM config] Using static CRM_ACCESS_TOKEN — no automatic refresh');

    warnSpy.mockRestore();
  });
});
