/**
 * Refresh Credential Store
 *
 * The CRM may rotate the refresh token on every refresh. The newest one must
 * survive restarts, so it is kept in Redis rather than only in process
 * memory. The env-configured token seeds the store the first time.
 */

import { Redis as IORedis } from 'ioredis';
import type { RedisOptions } from 'ioredis';

export const REFRESH_TOKEN_KEY = 'crm:oauth:refresh_token';

export interface CredentialStore {
  /** Current refresh token, or null when none has been persisted yet */
  loadRefreshToken(): Promise<string | null>;
  saveRefreshToken(token: string): Promise<void>;
}

export class RedisCredentialStore implements CredentialStore {
  private _redis: IORedis | null = null;

  constructor(
    private readonly connection: RedisOptions,
    private readonly key = REFRESH_TOKEN_KEY,
  ) {}

  // Lazy: no connection until the first refresh
  private getRedis(): IORedis {
    if (!this._redis) {
      this._redis = new IORedis(this.connection);
    }
    return this._redis;
  }

  async loadRefreshToken(): Promise<string | null> {
    return this.getRedis().get(this.key);
  }

  async saveRefreshToken(token: string): Promise<void> {
    await this.getRedis().set(this.key, token);
  }

  async close(): Promise<void> {
    if (this._redis) {
      await this._redis.quit();
      this._redis = null;
    }
  }
}

/** Process-local store for development without Redis, and for tests */
export class MemoryCredentialStore implements CredentialStore {
  constructor(private token: string | null = null) {}

  async loadRefreshToken(): Promise<string | null> {
    return this.token;
  }

  async saveRefreshToken(token: string): Promise<void> {
    this.token = token;
  }
}
