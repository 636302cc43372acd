import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DuplicateIdentityRaceError, TransientStorageError } from '../../errors.js';
import { EventLog, EVENT_TYPES } from '../../store/event-log.js';
import { InMemoryRepository } from '../../store/memory.js';
import { IdentityResolver, normalizeContact } from '../resolver.js';

function createResolver(options: { maxAttempts?: number } = {}) {
  const repo = new InMemoryRepository();
  const events = new EventLog(repo);
  const resolver = new IdentityResolver(repo, events, options);
  return { repo, resolver };
}

describe('normalizeContact', () => {
  it('normalises every attribute and maps blanks to null', () => {
    expect(
      normalizeContact({ firstName: '  Ada  ', lastName: '', email: ' ADA@Example.COM ', phone: '+1 (555) 010-2000' }),
    ).toEqual({ firstName: 'Ada', lastName: null, email: 'ada@example.com', phone: '+15550102000' });
  });
});

describe('IdentityResolver', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('creates an identity and records IdentityCreated', async () => {
    const { repo, resolver } = createResolver();

    const result = await resolver.resolve({ firstName: 'Ada', email: 'ada@example.com' }, 'WEB');

    expect(result).toMatchObject({ created: true, matchedBy: null, collision: null, enriched: [] });
    expect(repo.events).toHaveLength(1);
    expect(repo.events[0]).toMatchObject({
      ohid: result.ohid,
      eventType: EVENT_TYPES.IDENTITY_CREATED,
      payload: { fields: { firstName: 'Ada', email: 'ada@example.com' } },
      sourceSystem: 'WEB',
    });
  });

  it('matches on email regardless of case and spacing', async () => {
    const { resolver } = createResolver();
    const first = await resolver.resolve({ email: 'ada@example.com' }, 'WEB');

    const second = await resolver.resolve({ email: '  ADA@example.com' }, 'META');

    expect(second).toMatchObject({ ohid: first.ohid, created: false, matchedBy: 'email' });
  });

  it('matches on phone when email is absent', async () => {
    const { resolver } = createResolver();
    const first = await resolver.resolve({ phone: '+1 555 010 2000' }, 'TWILIO');

    const second = await resolver.resolve({ phone: '+1-555-010-2000' }, 'TWILIO');

    expect(second).toMatchObject({ ohid: first.ohid, matchedBy: 'phone' });
  });

  it('fills missing attributes without overwriting known ones', async () => {
    const { repo, resolver } = createResolver();
    const first = await resolver.resolve({ firstName: 'Ada', email: 'ada@example.com' }, 'WEB');

    const second = await resolver.resolve(
      { firstName: 'Adaline', lastName: 'Park', email: 'ada@example.com', phone: '555 0100' },
      'META',
    );

    expect(second.enriched).toEqual(['lastName', 'phone']);
    const identity = await repo.getIdentity(first.ohid);
    expect(identity).toMatchObject({ firstName: 'Ada', lastName: 'Park', phone: '5550100' });
    expect((await repo.findIdentityByKey({ kind: 'phone', value: '5550100' }))?.ohid).toBe(first.ohid);
    expect(repo.events[1]).toMatchObject({
      eventType: EVENT_TYPES.IDENTITY_ATTRIBUTES_CHANGED,
      payload: { fields: { lastName: 'Park', phone: '5550100' }, reason: 'enrichment' },
    });
  });

  it('prefers the email match when email and phone point at different identities', async () => {
    const { repo, resolver } = createResolver();
    const byEmail = await resolver.resolve({ email: 'ada@example.com' }, 'WEB');
    const byPhone = await resolver.resolve({ phone: '5550100' }, 'TWILIO');

    const result = await resolver.resolve({ email: 'ada@example.com', phone: '5550100' }, 'META');

    expect(result.ohid).toBe(byEmail.ohid);
    expect(result.collision).toEqual({ emailOhid: byEmail.ohid, phoneOhid: byPhone.ohid });
    expect(repo.identities.size).toBe(2);
    expect(result.enriched).toEqual(['phone']);
    expect(await repo.getIdentity(byEmail.ohid)).toMatchObject({ email: 'ada@example.com', phone: '5550100' });
    expect(await repo.getIdentity(byPhone.ohid)).toMatchObject({ email: null, phone: '5550100' });
    expect((await repo.findIdentityByKey({ kind: 'phone', value: '5550100' }))?.ohid).toBe(byPhone.ohid);
    const collision = repo.events.find((e) => e.eventType === EVENT_TYPES.IDENTITY_COLLISION);
    expect(collision?.payload).toEqual({
      emailOhid: byEmail.ohid,
      phoneOhid: byPhone.ohid,
      chosen: byEmail.ohid,
      rule: 'email-over-phone',
    });
  });

  it('converges concurrent resolutions of one new contact on a single identity', async () => {
    const { repo, resolver } = createResolver();

    const results = await Promise.all(
      Array.from({ length: 5 }, () => resolver.resolve({ email: 'race@example.com' }, 'WEB')),
    );

    expect(new Set(results.map((r) => r.ohid)).size).toBe(1);
    expect(results.filter((r) => r.created)).toHaveLength(1);
    expect(repo.identities.size).toBe(1);
  });

  it('creates a fresh identity for a contact with no email or phone', async () => {
    const { resolver } = createResolver();

    const first = await resolver.resolve({ firstName: 'Ada' }, 'WEB');
    const second = await resolver.resolve({ firstName: 'Ada' }, 'WEB');

    expect(second.created).toBe(true);
    expect(second.ohid).not.toBe(first.ohid);
  });

  it('surfaces a transient storage failure when every round is lost', async () => {
    const { repo, resolver } = createResolver({ maxAttempts: 2 });
    // A claim that never becomes visible to lookups
    vi.spyOn(repo, 'insertIdentityIfAbsent').mockResolvedValue({ inserted: false, conflictingOhid: 'ghost' });

    let caught: unknown;
    try {
      await resolver.resolve({ email: 'ada@example.com' }, 'WEB');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransientStorageError);
    expect(caught).toMatchObject({ message: 'Identity creation stayed contended after 2 attempts' });
    const cause = caught instanceof Error ? caught.cause : undefined;
    expect(cause).toBeInstanceOf(DuplicateIdentityRaceError);
    expect(cause).toMatchObject({ winningOhid: 'ghost' });
    expect(repo.insertIdentityIfAbsent).toHaveBeenCalledTimes(2);
  });

  describe('lookup', () => {
    it('finds by email first, then phone, and never creates', async () => {
      const { repo, resolver } = createResolver();
      const created = await resolver.resolve({ phone: '5550100' }, 'TWILIO');

      expect((await resolver.lookup({ email: 'none@example.com', phone: '555-0100' }))?.ohid).toBe(created.ohid);
      expect(await resolver.lookup({ email: 'none@example.com' })).toBeNull();
      expect(repo.identities.size).toBe(1);
    });
  });
});
