// ============================================================================
// CRM Client — authenticated record calls under {apiBase}/{module}
// ============================================================================
//
// Every call:
// - carries the current access token from the TokenManager
// - has a timeout (a timeout is transient)
// - on 401, invalidates the token once and retries with a fresh one
// - retries 429, 5xx and network failures with backoff and jitter
//
// Responses are validated with zod before they reach the reconciler.

import type { TokenManager } from '../auth/token-manager.js';
import { TransientRemoteError, describeError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import { CrmApiError, CrmAuthError, CrmRateLimitError } from './errors.js';
import {
  parseCrmTime,
  recordListSchema,
  toCrmRecord,
  writeResponseSchema,
} from './types/index.js';
import type { CrmRecord, CrmWriteResult } from './types/index.js';

// ============================================================================
// Types
// ============================================================================

export type TokenProvider = Pick<TokenManager, 'getToken' | 'invalidate'>;

export interface CrmClientOptions {
  apiBase: string;
  module: string;
  authScheme?: string;
  timeoutMs?: number;
  retry?: { attempts: number; baseDelayMs: number; maxDelayMs?: number };
}

export type SearchCriteria = { email: string } | { phone: string };

interface CrmResponse {
  status: number;
  text: string;
}

// ============================================================================
// Client
// ============================================================================

export class CrmClient {
  private readonly baseUrl: string;
  private readonly authScheme: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly tokens: TokenProvider,
    private readonly options: CrmClientOptions,
  ) {
    this.baseUrl = `${options.apiBase.replace(/\/+$/, '')}/${options.module}`;
    this.authScheme = options.authScheme ?? 'Bearer';
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  /** First record matching the criteria, or null (the CRM answers 204 for no match) */
  async search(criteria: SearchCriteria): Promise<CrmRecord | null> {
    const query = new URLSearchParams(criteria);
    const response = await this.crmFetch(`/search?${query.toString()}`, { method: 'GET' });
    if (response.status === 204 || response.text.length === 0) return null;

    const parsed = recordListSchema.parse(JSON.parse(response.text));
    const first = parsed.data[0];
    return first ? toCrmRecord(first) : null;
  }

  async getRecord(id: string): Promise<CrmRecord | null> {
    const response = await this.crmFetch(`/${encodeURIComponent(id)}`, { method: 'GET' });
    if (response.status === 204 || response.status === 404 || response.text.length === 0) return null;

    const parsed = recordListSchema.parse(JSON.parse(response.text));
    const first = parsed.data[0];
    return first ? toCrmRecord(first) : null;
  }

  async createRecord(fields: Record<string, string>): Promise<CrmWriteResult> {
    const response = await this.crmFetch('', {
      method: 'POST',
      body: JSON.stringify({ data: [fields] }),
    });
    const result = this.parseWrite(response);
    if (!result.id) {
      throw new CrmApiError('CRM create response carried no record id', response.status, response.text);
    }
    return { id: result.id, modifiedTime: result.modifiedTime };
  }

  async updateRecord(id: string, fields: Record<string, string>): Promise<CrmWriteResult> {
    const response = await this.crmFetch(`/${encodeURIComponent(id)}`, {
      method: 'PUT',
      body: JSON.stringify({ data: [fields] }),
    });
    const result = this.parseWrite(response);
    return { id, modifiedTime: result.modifiedTime };
  }

  // --------------------------------------------------------------------------
  // Transport
  // --------------------------------------------------------------------------

  private parseWrite(response: CrmResponse): { id: string | undefined; modifiedTime: Date | null } {
    const parsed = writeResponseSchema.parse(JSON.parse(response.text));
    const entry = parsed.data[0];
    if (entry.status === 'error') {
      throw new CrmApiError(
        `CRM rejected the write: ${entry.code ?? 'unknown'}`,
        response.status,
        response.text,
      );
    }
    return {
      id: entry.details?.id,
      modifiedTime: parseCrmTime(entry.details?.Modified_Time),
    };
  }

  private async crmFetch(path: string, init: { method: string; body?: string }): Promise<CrmResponse> {
    const retry = this.options.retry ?? { attempts: 4, baseDelayMs: 500 };
    // Shared across retry attempts: one invalidate-and-retry per call
    const auth = { refreshed: false };
    return withRetry(() => this.sendAuthorized(path, init, auth), {
      ...retry,
      shouldRetry: (err) => err instanceof TransientRemoteError,
      onRetry: (err, attempt, delayMs) => {
        console.warn('[crm] Request failed, retrying', {
          method: init.method,
          attempt,
          delayMs,
          error: describeError(err),
        });
      },
    });
  }

  private async sendAuthorized(
    path: string,
    init: { method: string; body?: string },
    auth: { refreshed: boolean },
  ): Promise<CrmResponse> {
    const token = await this.tokens.getToken();
    let response = await this.send(path, init, token);

    if (response.status === 401) {
      if (auth.refreshed) {
        throw new CrmAuthError(response.text);
      }
      auth.refreshed = true;
      console.warn('[crm] 401 from CRM — refreshing access token once');
      this.tokens.invalidate(token);
      response = await this.send(path, init, await this.tokens.getToken());
      if (response.status === 401) {
        throw new CrmAuthError(response.text);
      }
    }

    if (response.status === 429) {
      throw new CrmRateLimitError(response.text);
    }
    if (response.status >= 500) {
      throw new TransientRemoteError(`CRM API error: ${response.status}`, response.status, response.text);
    }
    if (response.status >= 400 && response.status !== 404) {
      throw new CrmApiError(`CRM API error: ${response.status}`, response.status, response.text);
    }
    return response;
  }

  private async send(path: string, init: { method: string; body?: string }, token: string): Promise<CrmResponse> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        headers: {
          Authorization: `${this.authScheme} ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransientRemoteError(`CRM API unreachable: ${describeError(err)}`);
    }
    return { status: response.status, text: await response.text() };
  }
}
