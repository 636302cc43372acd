// ============================================================================
// Engine Error Types — one class per failure kind the callers act on
// ============================================================================
//
// Messages never carry PII (emails, phone numbers, names). Callers branch on
// the class, not on message text.

/**
 * An inbound call failed authenticity verification.
 * Terminal for the request: reject, do not process, do not retry.
 */
export class AuthenticationFailureError extends Error {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Webhook verification failed for source "${source}": ${reason}`);
    this.name = 'AuthenticationFailureError';
    this.source = source;
  }
}

/**
 * The storage layer was unreachable or failed mid-operation.
 * Retried internally with bounded backoff, then surfaced.
 */
export class TransientStorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransientStorageError';
  }
}

/**
 * Network failure, timeout, 429 or 5xx from the CRM or its token endpoint.
 * Retried with exponential backoff and jitter up to a bounded attempt count.
 */
export class TransientRemoteError extends Error {
  readonly statusCode: number;
  readonly responseBody: string;

  constructor(message: string, statusCode = 0, responseBody = '') {
    super(message);
    this.name = 'TransientRemoteError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/**
 * The refresh credential itself was rejected (expired, revoked, rotated away).
 * Fatal until an operator supplies a new refresh token.
 */
export class CredentialExpiredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialExpiredError';
  }
}

/**
 * Two concurrent identity creations claimed the same contact value.
 * Handled inside the resolver by re-reading the winner; never reaches callers.
 */
export class DuplicateIdentityRaceError extends Error {
  readonly winningOhid: string;

  constructor(winningOhid: string) {
    super('Identity creation lost a uniqueness race');
    this.name = 'DuplicateIdentityRaceError';
    this.winningOhid = winningOhid;
  }
}

/** Short, PII-free description of any thrown value, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
