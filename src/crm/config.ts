import 'dotenv/config';

/**
 * CRM connection settings.
 *
 * Either an OAuth client (CRM_CLIENT_ID, CRM_CLIENT_SECRET, CRM_REFRESH_TOKEN)
 * or a static CRM_ACCESS_TOKEN must be configured before sync can run.
 */
export interface CrmConfig {
  /** Key under which sync links for this CRM are stored */
  remoteSystem: string;
  apiBase: string;
  /** Record module, e.g. "Leads" */
  module: string;
  /** Authorization header scheme ("Bearer", or "Zoho-oauthtoken") */
  authScheme: string;
  timeoutMs: number;
  oauth: {
    tokenUrl: string;
    clientId: string;
    clientSecret: string;
    refreshToken: string | null;
    staticAccessToken: string;
    safetyMarginMs: number;
  };
  /** CRM field that records which local source system a lead came from */
  attributionField: string;
  /** Value written to the required last-name field when none is known */
  lastNamePlaceholder: string;
  retry: {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const crmConfig: CrmConfig = {
  remoteSystem: optionalEnv('CRM_REMOTE_SYSTEM', 'zoho'),
  apiBase: optionalEnv('CRM_API_BASE', 'https://www.zohoapis.com/crm/v2'),
  module: optionalEnv('CRM_MODULE', 'Leads'),
  authScheme: optionalEnv('CRM_AUTH_SCHEME', 'Bearer'),
  timeoutMs: intEnv('CRM_TIMEOUT_MS', 15_000),
  oauth: {
    tokenUrl: optionalEnv('CRM_TOKEN_URL', 'https://accounts.zoho.com/oauth/v2/token'),
    clientId: optionalEnv('CRM_CLIENT_ID'),
    clientSecret: optionalEnv('CRM_CLIENT_SECRET'),
    refreshToken: process.env.CRM_REFRESH_TOKEN || null,
    staticAccessToken: optionalEnv('CRM_ACCESS_TOKEN'),
    safetyMarginMs: intEnv('CRM_TOKEN_SAFETY_MARGIN_MS', 5 * 60 * 1000),
  },
  attributionField: optionalEnv('CRM_ATTRIBUTION_FIELD', 'Lead_Source'),
  lastNamePlaceholder: optionalEnv('CRM_LAST_NAME_PLACEHOLDER', 'Unknown'),
  retry: {
    attempts: intEnv('CRM_RETRY_ATTEMPTS', 4),
    baseDelayMs: intEnv('CRM_RETRY_BASE_DELAY_MS', 500),
    maxDelayMs: intEnv('CRM_RETRY_MAX_DELAY_MS', 10_000),
  },
};

/**
 * Validates that the CRM credentials required for sync are populated.
 * Call this at application startup. Throws with a list of all missing fields.
 */
export function validateCrmConfig(config: CrmConfig = crmConfig): void {
  if (config.oauth.staticAccessToken && !config.oauth.clientId) {
    console.warn('[CRM config] Using static CRM_ACCESS_TOKEN — no automatic refresh');
    return;
  }

  const missing: string[] = [];
  if (!config.oauth.clientId) missing.push('CRM_CLIENT_ID');
  if (!config.oauth.clientSecret) missing.push('CRM_CLIENT_SECRET');
  if (!config.oauth.refreshToken) missing.push('CRM_REFRESH_TOKEN');

  if (missing.length > 0) {
    throw new Error(
      `CRM config incomplete. Missing environment variables:\n` +
      missing.map(k => `  - ${k}`).join('\n') +
      `\n\nSet CRM_ACCESS_TOKEN instead to use a static token.`
    );
  }
}
