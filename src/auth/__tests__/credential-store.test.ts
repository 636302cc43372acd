import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  get: vi.fn(),
  set: vi.fn(),
  quit: vi.fn(),
  Redis: vi.fn(),
}));

vi.mock('ioredis', () => ({
  Redis: mocks.Redis,
}));

import { MemoryCredentialStore, RedisCredentialStore, REFRESH_TOKEN_KEY } from '../credential-store.js';

describe('RedisCredentialStore', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.Redis.mockImplementation(() => ({ get: mocks.get, set: mocks.set, quit: mocks.quit }));
  });

  it('connects lazily on first use', async () => {
    const store = new RedisCredentialStore({ host: 'localhost', port: 6379 });
    expect(mocks.Redis).not.toHaveBeenCalled();

    mocks.get.mockResolvedValue('refresh-1');
    expect(await store.loadRefreshToken()).toBe('refresh-1');
    expect(await store.loadRefreshToken()).toBe('refresh-1');

    expect(mocks.Redis).toHaveBeenCalledTimes(1);
    expect(mocks.Redis).toHaveBeenCalledWith({ host: 'localhost', port: 6379 });
    expect(mocks.get).toHaveBeenCalledWith(REFRESH_TOKEN_KEY);
  });

  it('returns null when nothing has been persisted', async () => {
    mocks.get.mockResolvedValue(null);
    const store = new RedisCredentialStore({});
    expect(await store.loadRefreshToken()).toBeNull();
  });

  it('writes rotated tokens under the configured key', async () => {
    mocks.set.mockResolvedValue('OK');
    const store = new RedisCredentialStore({}, 'test:refresh');

    await store.saveRefreshToken('refresh-2');

    expect(mocks.set).toHaveBeenCalledWith('test:refresh', 'refresh-2');
  });

  it('closes only an open connection', async () => {
    const store = new RedisCredentialStore({});
    await store.close();
    expect(mocks.quit).not.toHaveBeenCalled();

    mocks.get.mockResolvedValue(null);
    await store.loadRefreshToken();
    await store.close();
    expect(mocks.quit).toHaveBeenCalledTimes(1);
  });
});

describe('MemoryCredentialStore', () => {
  it('holds the seeded token until replaced', async () => {
    const store = new MemoryCredentialStore('seed');
    expect(await store.loadRefreshToken()).toBe('seed');
    await store.saveRefreshToken('next');
    expect(await store.loadRefreshToken()).toBe('next');
  });
});
