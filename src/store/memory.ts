/**
 * In-Memory Repository
 *
 * Same semantics as the Postgres repository, kept in process. Used when no
 * database is configured (local development) and by the test suite.
 *
 * Every method mutates state before its first await, so each call is atomic
 * with respect to other callers on the event loop. That is what gives the
 * contact-key claims their insert-if-absent behaviour here.
 */

import type {
  AppendEventResult,
  CanonicalIdentity,
  ContactKey,
  IdentityAttributes,
  IdentityField,
  InsertIdentityResult,
  InsertLeadContextResult,
  LeadContextRecord,
  ListEventsOptions,
  NewWorkflowEvent,
  Repository,
  SyncLink,
  WorkflowEventRecord,
} from './types.js';
import { IDENTITY_FIELDS } from './types.js';

function keyOf(key: ContactKey): string {
  return `${key.kind}:${key.value}`;
}

export class InMemoryRepository implements Repository {
  readonly identities = new Map<string, CanonicalIdentity>();
  readonly contactKeys = new Map<string, string>();
  readonly leadContexts = new Map<string, LeadContextRecord>();
  readonly events: WorkflowEventRecord[] = [];
  readonly syncLinks = new Map<string, SyncLink>();

  private seq = 0;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async findIdentityByKey(key: ContactKey): Promise<CanonicalIdentity | null> {
    const ohid = this.contactKeys.get(keyOf(key));
    return ohid ? this.copy(ohid) : null;
  }

  async getIdentity(ohid: string): Promise<CanonicalIdentity | null> {
    return this.copy(ohid);
  }

  async insertIdentityIfAbsent(identity: CanonicalIdentity, keys: ContactKey[]): Promise<InsertIdentityResult> {
    for (const key of keys) {
      const owner = this.contactKeys.get(keyOf(key));
      if (owner) {
        return { inserted: false, conflictingOhid: owner };
      }
    }
    this.identities.set(identity.ohid, { ...identity });
    for (const key of keys) {
      this.contactKeys.set(keyOf(key), identity.ohid);
    }
    return { inserted: true, identity: { ...identity } };
  }

  async claimContactKey(ohid: string, key: ContactKey): Promise<string> {
    const existing = this.contactKeys.get(keyOf(key));
    if (existing) return existing;
    this.contactKeys.set(keyOf(key), ohid);
    return ohid;
  }

  async updateIdentityAttributes(
    ohid: string,
    attributes: Partial<IdentityAttributes>,
    options: { onlyIfNull: boolean },
  ): Promise<{ identity: CanonicalIdentity; changed: IdentityField[] }> {
    const current = this.identities.get(ohid);
    if (!current) {
      throw new Error(`Identity ${ohid} not found`);
    }

    const changed: IdentityField[] = [];
    for (const field of IDENTITY_FIELDS) {
      const next = attributes[field];
      if (next === undefined || next === null) continue;
      if (options.onlyIfNull && current[field] !== null) continue;
      if (current[field] === next) continue;
      current[field] = next;
      changed.push(field);
    }
    if (changed.length > 0) {
      current.updatedAt = this.now();
    }
    return { identity: { ...current }, changed };
  }

  async findLeadContext(sourceSystem: string, sourceLeadId: string): Promise<LeadContextRecord | null> {
    return this.leadContextFor(sourceSystem, sourceLeadId);
  }

  // Check and insert run in one synchronous step, like the unique index
  async insertLeadContext(record: LeadContextRecord): Promise<InsertLeadContextResult> {
    const existing = this.leadContextFor(record.sourceSystem, record.sourceLeadId);
    if (existing) {
      return { inserted: false, existing };
    }
    this.leadContexts.set(record.id, record);
    return { inserted: true };
  }

  private leadContextFor(sourceSystem: string, sourceLeadId: string): LeadContextRecord | null {
    for (const existing of this.leadContexts.values()) {
      if (existing.sourceSystem === sourceSystem && existing.sourceLeadId === sourceLeadId) {
        return existing;
      }
    }
    return null;
  }

  async listLeadContexts(ohid: string): Promise<LeadContextRecord[]> {
    return [...this.leadContexts.values()]
      .filter((r) => r.ohid === ohid)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async appendWorkflowEvent(event: NewWorkflowEvent): Promise<AppendEventResult> {
    const existing = this.events.find((e) => e.id === event.id);
    if (existing) {
      return { inserted: false, event: existing };
    }
    this.seq += 1;
    const record: WorkflowEventRecord = { ...event, seq: this.seq };
    this.events.push(record);
    return { inserted: true, event: record };
  }

  async listWorkflowEvents(ohid: string, options: ListEventsOptions = {}): Promise<WorkflowEventRecord[]> {
    return this.events
      .filter((e) => e.ohid === ohid)
      .filter((e) => !options.eventTypes || options.eventTypes.includes(e.eventType))
      .filter((e) => !options.since || e.occurredAt.getTime() > options.since.getTime())
      .sort((a, b) => a.occurredAt.getTime() - b.occurredAt.getTime() || a.seq - b.seq);
  }

  async getSyncLink(ohid: string, remoteSystem: string): Promise<SyncLink | null> {
    const link = this.syncLinks.get(`${ohid}:${remoteSystem}`);
    return link ? { ...link, remoteDigest: { ...link.remoteDigest } } : null;
  }

  async upsertSyncLink(link: SyncLink): Promise<void> {
    this.syncLinks.set(`${link.ohid}:${link.remoteSystem}`, { ...link, remoteDigest: { ...link.remoteDigest } });
  }

  async close(): Promise<void> {
    // nothing to release
  }

  private copy(ohid: string): CanonicalIdentity | null {
    const identity = this.identities.get(ohid);
    return identity ? { ...identity } : null;
  }
}
