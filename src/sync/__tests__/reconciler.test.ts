/**
 * Sync Reconciler Tests
 *
 * Runs the reconciler over the in-memory repository and a fake CRM that
 * keeps records in a map. A shared clock orders local edits, remote edits
 * and sync runs so the conflict policy can be observed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SearchCriteria } from '../../crm/client.js';
import type { CrmRecord, CrmWriteResult } from '../../crm/types/index.js';
import { TransientRemoteError } from '../../errors.js';
import { normalizePhone } from '../../identity/normalize.js';
import { IdentityResolver } from '../../identity/resolver.js';
import { EventLog, EVENT_TYPES } from '../../store/event-log.js';
import { InMemoryRepository } from '../../store/memory.js';
import { SyncReconciler } from '../reconciler.js';
import type { CrmApi } from '../reconciler.js';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');
const MINUTE = 60_000;

class FakeCrm implements CrmApi {
  readonly records = new Map<string, CrmRecord>();
  private nextId = 1;

  constructor(private readonly clock: () => Date) {}

  search = vi.fn(async (criteria: SearchCriteria): Promise<CrmRecord | null> => {
    for (const record of this.records.values()) {
      if ('email' in criteria && record.fields.Email?.toLowerCase() === criteria.email) return { ...record };
      if ('phone' in criteria && normalizePhone(record.fields.Phone) === criteria.phone) return { ...record };
    }
    return null;
  });

  getRecord = vi.fn(async (id: string): Promise<CrmRecord | null> => {
    const record = this.records.get(id);
    return record ? { ...record, fields: { ...record.fields } } : null;
  });

  createRecord = vi.fn(async (fields: Record<string, string>): Promise<CrmWriteResult> => {
    const id = `zr-${this.nextId++}`;
    this.records.set(id, { id, fields: { ...fields }, modifiedTime: this.clock() });
    return { id, modifiedTime: this.clock() };
  });

  updateRecord = vi.fn(async (id: string, fields: Record<string, string>): Promise<CrmWriteResult> => {
    this.edit(id, fields);
    return { id, modifiedTime: this.clock() };
  });

  /** Simulate an edit made by a CRM user */
  edit(id: string, fields: Record<string, string | null>): void {
    const record = this.records.get(id);
    if (!record) throw new Error(`no record ${id}`);
    this.records.set(id, { id, fields: { ...record.fields, ...fields }, modifiedTime: this.clock() });
  }
}

function createHarness() {
  let now = T0;
  const clock = () => new Date(now);
  const repo = new InMemoryRepository({ now: clock });
  const events = new EventLog(repo, null, clock);
  const resolver = new IdentityResolver(repo, events, { now: clock });
  const crm = new FakeCrm(clock);
  const reconciler = new SyncReconciler(repo, events, crm, {
    remoteSystem: 'zoho',
    attributionField: 'Lead_Source',
    defaultSource: 'LEAD_SYNC',
    lastNamePlaceholder: 'Unknown',
    now: clock,
  });
  return {
    repo,
    events,
    resolver,
    crm,
    reconciler,
    at: (minutes: number) => {
      now = T0 + minutes * MINUTE;
    },
    iso: (minutes: number) => new Date(T0 + minutes * MINUTE).toISOString(),
  };
}

describe('SyncReconciler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  describe('creating the remote record', () => {
    it('creates a record with attribution from the first lead and links it', async () => {
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ firstName: 'Lee', phone: '+1 555 010 3000' }, 'META');
      await h.repo.insertLeadContext({
        id: 'ctx-1',
        ohid,
        sourceSystem: 'META',
        sourceLeadId: 'lead-1',
        channel: 'META_LEAD_AD',
        payload: {},
        consent: null,
        createdAt: new Date(T0),
      });

      h.at(1);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result).toEqual({
        ohid,
        direction: 'bidirectional',
        status: 'synced',
        remoteId: 'zr-1',
        created: true,
        pulled: [],
        pushed: ['firstName', 'phone'],
        conflicts: [],
      });
      expect(h.crm.createRecord).toHaveBeenCalledWith({
        First_Name: 'Lee',
        Phone: '+15550103000',
        Last_Name: 'Unknown',
        Lead_Source: 'META',
      });
      const link = await h.repo.getSyncLink(ohid, 'zoho');
      expect(link?.remoteId).toBe('zr-1');
      expect(link?.lastSyncedAt.toISOString()).toBe(h.iso(1));
    });

    it('reads the last-name placeholder back as unknown on the next run', async () => {
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ firstName: 'Lee', phone: '+1 555 010 3000' }, 'META');
      await h.reconciler.reconcile(ohid, 'bidirectional');

      h.at(5);
      const second = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(second.status).toBe('unchanged');
      expect((await h.repo.getIdentity(ohid))?.lastName).toBeNull();
      expect(h.crm.updateRecord).not.toHaveBeenCalled();
    });

    it('returns not_found for inbound sync without creating anything', async () => {
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ email: 'nobody@example.com' }, 'WEB');

      const result = await h.reconciler.reconcile(ohid, 'inbound');

      expect(result.status).toBe('not_found');
      expect(result.remoteId).toBeNull();
      expect(h.crm.createRecord).not.toHaveBeenCalled();
    });
  });

  describe('first sync against an existing record', () => {
    it('pulls values only the CRM has and pushes values only we have', async () => {
      const h = createHarness();
      h.crm.records.set('zr-9', {
        id: 'zr-9',
        fields: { First_Name: null, Last_Name: 'Park', Email: 'ada@example.com', Phone: '+1 555 010 2000', Lead_Source: 'META' },
        modifiedTime: new Date(T0),
      });
      const { ohid } = await h.resolver.resolve({ firstName: 'Ada', lastName: 'Park', email: 'ada@example.com' }, 'WEB');

      h.at(1);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result.status).toBe('synced');
      expect(result.remoteId).toBe('zr-9');
      expect(result.pulled).toEqual(['phone']);
      expect(result.pushed).toEqual(['firstName']);
      expect(h.crm.updateRecord).toHaveBeenCalledWith('zr-9', { First_Name: 'Ada', Lead_Source: 'LEAD_SYNC' });
      expect((await h.repo.getIdentity(ohid))?.phone).toBe('+15550102000');
      expect((await h.repo.findIdentityByKey({ kind: 'phone', value: '+15550102000' }))?.ohid).toBe(ohid);
    });

    it('is unchanged on the next run once both sides agree', async () => {
      const h = createHarness();
      h.crm.records.set('zr-9', {
        id: 'zr-9',
        fields: { First_Name: null, Last_Name: 'Park', Email: 'ada@example.com', Phone: '+1 555 010 2000' },
        modifiedTime: new Date(T0),
      });
      const { ohid } = await h.resolver.resolve({ firstName: 'Ada', lastName: 'Park', email: 'ada@example.com' }, 'WEB');
      await h.reconciler.reconcile(ohid, 'bidirectional');

      h.at(10);
      const second = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(second).toMatchObject({ status: 'unchanged', pulled: [], pushed: [], conflicts: [] });
      expect(h.crm.updateRecord).toHaveBeenCalledTimes(1);
    });
  });

  describe('conflicts', () => {
    async function linkedIdentity(h: ReturnType<typeof createHarness>) {
      const { ohid } = await h.resolver.resolve({ firstName: 'Ada', lastName: 'Park', email: 'ada@example.com' }, 'WEB');
      h.at(1);
      const created = await h.reconciler.reconcile(ohid, 'bidirectional');
      return { ohid, remoteId: created.remoteId ?? '' };
    }

    async function editLocally(h: ReturnType<typeof createHarness>, ohid: string, firstName: string) {
      await h.repo.updateIdentityAttributes(ohid, { firstName }, { onlyIfNull: false });
      await h.events.record({
        ohid,
        eventType: EVENT_TYPES.IDENTITY_ATTRIBUTES_CHANGED,
        payload: { fields: { firstName }, reason: 'operator' },
        sourceSystem: 'TOOLS',
      });
    }

    it('keeps the local value when it changed after the remote one', async () => {
      const h = createHarness();
      const { ohid, remoteId } = await linkedIdentity(h);

      h.at(2);
      h.crm.edit(remoteId, { First_Name: 'Adeline' });
      h.at(3);
      await editLocally(h, ohid, 'Addy');

      h.at(4);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result.pushed).toEqual(['firstName']);
      expect(result.conflicts).toEqual([
        {
          field: 'firstName',
          winner: 'local',
          localChangedAt: h.iso(3),
          remoteModifiedAt: h.iso(2),
          reason: 'local-newer',
        },
      ]);
      expect(h.crm.records.get(remoteId)?.fields.First_Name).toBe('Addy');
      expect(h.repo.events.filter((e) => e.eventType === EVENT_TYPES.SYNC_CONFLICT_RESOLVED)).toHaveLength(1);
    });

    it('takes the remote value when it changed last, then settles', async () => {
      const h = createHarness();
      const { ohid, remoteId } = await linkedIdentity(h);

      h.at(2);
      await editLocally(h, ohid, 'Addy');
      h.at(3);
      h.crm.edit(remoteId, { First_Name: 'Adeline' });

      h.at(4);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result.pulled).toEqual(['firstName']);
      expect(result.conflicts[0]).toMatchObject({ winner: 'remote', reason: 'remote-newer-or-equal' });
      expect((await h.repo.getIdentity(ohid))?.firstName).toBe('Adeline');

      h.at(5);
      const again = await h.reconciler.reconcile(ohid, 'bidirectional');
      expect(again.status).toBe('unchanged');
    });

    it('pulls a remote-only change without recording a conflict', async () => {
      const h = createHarness();
      const { ohid, remoteId } = await linkedIdentity(h);

      h.at(2);
      h.crm.edit(remoteId, { Phone: '+1 555 010 4000' });

      h.at(3);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result.pulled).toEqual(['phone']);
      expect(result.conflicts).toEqual([]);
      expect((await h.repo.getIdentity(ohid))?.phone).toBe('+15550104000');
    });

    it('never clears a local value the CRM has emptied', async () => {
      const h = createHarness();
      const { ohid, remoteId } = await linkedIdentity(h);

      h.at(2);
      h.crm.edit(remoteId, { First_Name: null });

      h.at(3);
      const result = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(result.pulled).toEqual([]);
      expect((await h.repo.getIdentity(ohid))?.firstName).toBe('Ada');
    });
  });

  describe('runs overlapping other writes', () => {
    it('pushes a local edit committed while the previous run was in flight', async () => {
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ firstName: 'Lee', email: 'lee@example.com' }, 'WEB');
      h.at(1);
      const created = await h.reconciler.reconcile(ohid, 'bidirectional');
      const remoteId = created.remoteId ?? '';

      h.at(5);
      h.crm.getRecord.mockImplementationOnce(async (id: string) => {
        // A lead enriches the identity after the run has read it
        h.at(6);
        await h.resolver.resolve({ email: 'lee@example.com', phone: '+15550100' }, 'WEB');
        const record = h.crm.records.get(id);
        return record ? { ...record, fields: { ...record.fields } } : null;
      });
      const second = await h.reconciler.reconcile(ohid, 'bidirectional');
      expect(second.pushed).toEqual([]);
      expect((await h.repo.getSyncLink(ohid, 'zoho'))?.lastSyncedAt.toISOString()).toBe(h.iso(5));

      h.at(10);
      const third = await h.reconciler.reconcile(ohid, 'bidirectional');

      expect(third).toMatchObject({ status: 'synced', pushed: ['phone'] });
      expect(h.crm.records.get(remoteId)?.fields.Phone).toBe('+15550100');
    });

    it('creates one remote record when two runs for one identity overlap', async () => {
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ firstName: 'Lee', email: 'lee@example.com' }, 'WEB');
      h.crm.search.mockImplementationOnce(async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return null;
      });

      const [first, second] = await Promise.all([
        h.reconciler.reconcile(ohid, 'bidirectional'),
        h.reconciler.reconcile(ohid, 'bidirectional'),
      ]);

      expect(h.crm.records.size).toBe(1);
      expect(h.crm.createRecord).toHaveBeenCalledTimes(1);
      expect(first).toMatchObject({ created: true, remoteId: 'zr-1' });
      expect(second).toMatchObject({ created: false, remoteId: 'zr-1', status: 'unchanged' });
    });

    it('still runs a queued reconcile after the one ahead of it fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ firstName: 'Lee', email: 'lee@example.com' }, 'WEB');
      h.crm.createRecord.mockRejectedValueOnce(new TransientRemoteError('CRM API error: 503', 503));

      const [first, second] = await Promise.allSettled([
        h.reconciler.reconcile(ohid, 'bidirectional'),
        h.reconciler.reconcile(ohid, 'bidirectional'),
      ]);

      expect(first.status).toBe('rejected');
      expect(second).toMatchObject({ status: 'fulfilled', value: { created: true, remoteId: 'zr-1' } });
    });
  });

  describe('one-way directions', () => {
    it('outbound overwrites differing remote values', async () => {
      const h = createHarness();
      h.crm.records.set('zr-9', {
        id: 'zr-9',
        fields: { First_Name: 'Adeline', Last_Name: 'Park', Email: 'ada@example.com', Phone: null },
        modifiedTime: new Date(T0 + 10 * MINUTE),
      });
      const { ohid } = await h.resolver.resolve({ firstName: 'Ada', lastName: 'Park', email: 'ada@example.com' }, 'WEB');

      const result = await h.reconciler.reconcile(ohid, 'outbound');

      expect(result.pushed).toEqual(['firstName']);
      expect(result.pulled).toEqual([]);
      expect(h.crm.records.get('zr-9')?.fields.First_Name).toBe('Ada');
    });

    it('inbound overwrites differing local values', async () => {
      const h = createHarness();
      h.crm.records.set('zr-9', {
        id: 'zr-9',
        fields: { First_Name: 'Adeline', Last_Name: 'Park', Email: 'ada@example.com', Phone: null },
        modifiedTime: new Date(T0),
      });
      const { ohid } = await h.resolver.resolve({ firstName: 'Ada', lastName: 'Park', email: 'ada@example.com' }, 'WEB');

      const result = await h.reconciler.reconcile(ohid, 'inbound');

      expect(result.pulled).toEqual(['firstName']);
      expect(h.crm.updateRecord).not.toHaveBeenCalled();
      expect((await h.repo.getIdentity(ohid))?.firstName).toBe('Adeline');
    });
  });

  describe('failures', () => {
    it('records SyncFailed and rethrows', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const h = createHarness();
      const { ohid } = await h.resolver.resolve({ email: 'ada@example.com' }, 'WEB');
      const failure = new TransientRemoteError('CRM API error: 503', 503);
      h.crm.search.mockRejectedValueOnce(failure);

      await expect(h.reconciler.reconcile(ohid, 'bidirectional')).rejects.toBe(failure);

      const failed = h.repo.events.find((e) => e.eventType === EVENT_TYPES.SYNC_FAILED);
      expect(failed?.payload).toEqual({
        direction: 'bidirectional',
        errorName: 'TransientRemoteError',
        error: 'CRM API error: 503',
      });
    });

    it('rejects an unknown identity', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const h = createHarness();

      await expect(h.reconciler.reconcile('missing', 'bidirectional')).rejects.toThrow('Unknown identity missing');
    });
  });
});
