// ============================================================================
// Token Manager — CRM OAuth2 access-token lifecycle
// ============================================================================
//
// One instance per process, passed by reference to every component that
// calls the CRM. State machine:
//
//   unloaded ──refresh──▶ valid ──(margin reached)──▶ expiring_soon
//       ▲                  │  ▲                          │
//       │            invalidate() └──background refresh──┘
//       │                  ▼
//       └──────────────  invalid ──refresh──▶ valid
//
//   any refresh rejected by the provider ──▶ credential_expired (terminal)
//
// Single-flight: concurrent callers share one in-flight refresh promise, so
// the token endpoint sees one request no matter how many callers are waiting.
// The cached token is returned while a background refresh runs.

import { z } from 'zod';
import { CredentialExpiredError, TransientRemoteError, describeError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import type { CredentialStore } from './credential-store.js';

// ============================================================================
// Types
// ============================================================================

export type TokenState =
  | 'unloaded'
  | 'valid'
  | 'expiring_soon'
  | 'refreshing'
  | 'invalid'
  | 'credential_expired';

export interface TokenManagerOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  /** Seed used until a rotated refresh token has been persisted */
  initialRefreshToken: string | null;
  credentialStore: CredentialStore;
  /** Fixed token used when no OAuth client is configured */
  staticAccessToken?: string;
  /** Refresh ahead of expiry by this much (default 5 minutes) */
  safetyMarginMs?: number;
  /** Per-request timeout for the token endpoint (default 15s) */
  timeoutMs?: number;
  retry?: { attempts: number; baseDelayMs: number; maxDelayMs?: number };
  now?: () => number;
}

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

// ============================================================================
// Response schemas
// ============================================================================

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
});

const oauthErrorSchema = z.object({
  error: z.string().min(1),
});

const DEFAULT_EXPIRES_IN_SECONDS = 3600;

// ============================================================================
// Manager
// ============================================================================

export class TokenManager {
  private cached: CachedToken | null = null;
  private invalidated = false;
  private inFlight: Promise<string> | null = null;
  private expired: CredentialExpiredError | null = null;
  /** Rotated refresh token the credential store failed to save */
  private unsaved: string | null = null;

  private readonly safetyMarginMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(private readonly options: TokenManagerOptions) {
    this.safetyMarginMs = options.safetyMarginMs ?? 5 * 60 * 1000;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.now = options.now ?? Date.now;
  }

  /** true when either an OAuth client or a static token is configured */
  get isConfigured(): boolean {
    return this.hasOAuthClient || Boolean(this.options.staticAccessToken);
  }

  private get hasOAuthClient(): boolean {
    return Boolean(this.options.clientId && this.options.clientSecret);
  }

  state(): TokenState {
    if (this.expired) return 'credential_expired';
    if (this.inFlight) return 'refreshing';
    if (!this.cached) return 'unloaded';

    const now = this.now();
    if (this.invalidated || now >= this.cached.expiresAt) return 'invalid';
    if (this.cached.expiresAt - now < this.safetyMarginMs) return 'expiring_soon';
    return 'valid';
  }

  /**
   * Return a usable access token.
   *
   * @throws CredentialExpiredError once the provider has rejected the refresh credential
   * @throws TransientRemoteError when the token endpoint stays unavailable across retries
   */
  async getToken(): Promise<string> {
    if (this.expired) throw this.expired;

    if (!this.hasOAuthClient && this.options.staticAccessToken) {
      return this.options.staticAccessToken;
    }

    const cached = this.cached;
    const now = this.now();
    if (cached && !this.invalidated && now < cached.expiresAt) {
      if (cached.expiresAt - now < this.safetyMarginMs) {
        this.refresh().catch((err) => {
          console.error('[auth] Background token refresh failed', { error: describeError(err) });
        });
      }
      return cached.accessToken;
    }

    return this.refresh();
  }

  /**
   * Force the next getToken() to refresh (e.g. after the CRM answered 401).
   *
   * @param rejected - the token the CRM refused; ignored when it is no longer
   *   the cached one, since a refresh has already replaced it
   */
  invalidate(rejected?: string): void {
    if (this.expired) return;
    if (rejected !== undefined && rejected !== this.cached?.accessToken) {
      console.log('[auth] Ignoring 401 for a token that was already replaced');
      return;
    }
    this.invalidated = true;
    console.log('[auth] Access token invalidated');
  }

  // --------------------------------------------------------------------------
  // Refresh
  // --------------------------------------------------------------------------

  private refresh(): Promise<string> {
    if (!this.inFlight) {
      this.inFlight = this.performRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async performRefresh(): Promise<string> {
    const refreshToken =
      this.unsaved ??
      (await this.options.credentialStore.loadRefreshToken()) ??
      this.options.initialRefreshToken;

    if (!refreshToken) {
      throw this.markExpired('No refresh token configured');
    }

    const retry = this.options.retry ?? { attempts: 4, baseDelayMs: 500 };
    const body = await withRetry(() => this.requestToken(refreshToken), {
      ...retry,
      shouldRetry: (err) => err instanceof TransientRemoteError,
      onRetry: (err, attempt, delayMs) => {
        console.warn('[auth] Token refresh failed, retrying', {
          attempt,
          delayMs,
          error: describeError(err),
        });
      },
    });

    // Persist a rotated refresh token before anyone can use the new access token
    const latest = body.refresh_token ?? refreshToken;
    if (latest !== refreshToken || this.unsaved !== null) {
      await this.persistRefreshToken(latest);
    }

    const expiresIn = body.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    this.cached = {
      accessToken: body.access_token,
      expiresAt: this.now() + expiresIn * 1000,
    };
    this.invalidated = false;

    console.log('[auth] Access token refreshed', { expiresInSeconds: expiresIn });
    return body.access_token;
  }

  /**
   * The provider has already rotated the old token away, so a failed save
   * keeps the new one in memory and tries the store again on the next refresh.
   */
  private async persistRefreshToken(token: string): Promise<void> {
    try {
      await this.options.credentialStore.saveRefreshToken(token);
      this.unsaved = null;
      console.log('[auth] Rotated refresh token persisted');
    } catch (err) {
      this.unsaved = token;
      console.error('[auth] Could not persist rotated refresh token, keeping it in memory', {
        error: describeError(err),
      });
    }
  }

  private async requestToken(refreshToken: string): Promise<z.infer<typeof tokenResponseSchema>> {
    const form = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      refresh_token: refreshToken,
    });

    let response: Response;
    try {
      response = await fetch(this.options.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: form.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransientRemoteError(`Token endpoint unreachable: ${describeError(err)}`);
    }

    const text = await response.text();

    if (response.status === 429 || response.status >= 500) {
      throw new TransientRemoteError(`Token endpoint returned ${response.status}`, response.status, text);
    }
    if (response.status === 400 || response.status === 401) {
      throw this.markExpired(`Token endpoint rejected the refresh credential (${response.status})`);
    }
    if (!response.ok) {
      throw new Error(`Token endpoint returned unexpected status ${response.status}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new TransientRemoteError('Token endpoint returned a non-JSON body', response.status, text);
    }

    // Some providers answer 200 with { "error": "invalid_code" }
    const oauthError = oauthErrorSchema.safeParse(json);
    if (oauthError.success) {
      throw this.markExpired(`Token endpoint returned OAuth error "${oauthError.data.error}"`);
    }

    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new TransientRemoteError('Token response missing access_token', response.status, text);
    }
    return parsed.data;
  }

  private markExpired(reason: string): CredentialExpiredError {
    this.expired = new CredentialExpiredError(
      `CRM refresh credential is no longer valid: ${reason}. Supply a new refresh token and restart.`,
    );
    this.cached = null;
    console.error('[auth] Refresh credential rejected — no further refresh attempts', { reason });
    return this.expired;
  }
}
