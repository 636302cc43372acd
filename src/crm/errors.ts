// ============================================================================
// CRM Error Types — Typed errors for API call failures
// ============================================================================

import { TransientRemoteError } from '../errors.js';

/**
 * Base error for non-retryable CRM API failures.
 * Includes the HTTP status code and response body for debugging.
 * NEVER includes PII (emails, phone numbers, names) in messages.
 */
export class CrmApiError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode: number, responseBody: string) {
    super(message);
    this.name = 'CrmApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * Thrown on HTTP 429 (Too Many Requests).
 * A TransientRemoteError, so the client's retry loop backs off and tries again.
 */
export class CrmRateLimitError extends TransientRemoteError {
  constructor(responseBody: string) {
    super('CRM API rate limit exceeded (429). Retry after backoff.', 429, responseBody);
    this.name = 'CrmRateLimitError';
  }
}

/**
 * Thrown when the CRM still answers 401 after one token refresh.
 * The access token was accepted by the token endpoint but not by the API,
 * which usually means missing scopes.
 */
export class CrmAuthError extends CrmApiError {
  constructor(responseBody: string) {
    super(
      'CRM API authentication failed (401) after token refresh. Check the OAuth client scopes.',
      401,
      responseBody,
    );
    this.name = 'CrmAuthError';
  }
}
