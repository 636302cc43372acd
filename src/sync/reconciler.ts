// ============================================================================
// Sync Reconciler — local identity ↔ CRM record
// ============================================================================
//
// Flow for one reconcile(ohid, direction):
//   1. Load the identity and its SyncLink
//   2. Locate the remote record: linked id, else search by email, then phone
//   3. Per field, decide pull, push or nothing
//   4. Apply local writes, then one remote write (create or update)
//   5. Upsert the SyncLink: remote id, digest of final remote values,
//      lastSyncedAt taken when the run started, before the identity was read
//   6. Append SyncCompleted, or SyncFailed when anything throws
//
// An edit committed while a run is in flight is newer than that run's
// lastSyncedAt, so the next run still sees it as a local change. Runs for
// one ohid are queued behind each other within the process, so two jobs
// for the same identity cannot both miss the link and create two records.
//
// Bidirectional conflict policy: when both sides changed a field since the
// last sync, local wins only with a strictly newer timestamp than the remote
// record's last modification. Ties and missing timestamps go to the remote.
// Null never overwrites a value on either side.

import { describeError } from '../errors.js';
import { normalizeEmail, normalizeName, normalizePhone } from '../identity/normalize.js';
import type { CrmClient } from '../crm/client.js';
import { CRM_FIELDS } from '../crm/types/index.js';
import type { CrmRecord } from '../crm/types/index.js';
import { EVENT_TYPES } from '../store/event-log.js';
import type { EventLog } from '../store/event-log.js';
import { IDENTITY_FIELDS } from '../store/types.js';
import type {
  CanonicalIdentity,
  IdentityAttributes,
  IdentityField,
  Repository,
  SyncLink,
} from '../store/types.js';
import { digestFields, fieldDigest } from './digest.js';
import type { ConflictDecision, SyncDirection, SyncResult } from './types.js';

// ============================================================================
// Types
// ============================================================================

export type CrmApi = Pick<CrmClient, 'search' | 'getRecord' | 'createRecord' | 'updateRecord'>;

export interface SyncReconcilerOptions {
  /** SyncLink key and sourceSystem of inbound-apply events */
  remoteSystem: string;
  /** CRM field carrying the originating local source system */
  attributionField: string;
  /** Attribution used when an identity has no lead context */
  defaultSource: string;
  /** CRM last-name value that means "unknown" */
  lastNamePlaceholder: string;
  now?: () => Date;
}

/** Marks identity changes written by this reconciler so they never count as local edits */
export const SYNC_INBOUND_REASON = 'sync-inbound';

type FieldValues = Record<IdentityField, string | null>;

type FieldAction = 'pull' | 'push' | 'none';

// ============================================================================
// Reconciler
// ============================================================================

export class SyncReconciler {
  private readonly now: () => Date;
  /** Tail of the run queue per ohid */
  private readonly queued = new Map<string, Promise<SyncResult>>();

  constructor(
    private readonly repo: Repository,
    private readonly events: EventLog,
    private readonly crm: CrmApi,
    private readonly options: SyncReconcilerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async reconcile(ohid: string, direction: SyncDirection): Promise<SyncResult> {
    const previous = this.queued.get(ohid);
    const start = () => this.reconcileNow(ohid, direction);
    // Start after the previous run settles, whatever its outcome
    const current = previous ? previous.then(start, start) : start();
    this.queued.set(ohid, current);
    try {
      return await current;
    } finally {
      if (this.queued.get(ohid) === current) this.queued.delete(ohid);
    }
  }

  private async reconcileNow(ohid: string, direction: SyncDirection): Promise<SyncResult> {
    try {
      const result = await this.run(ohid, direction);
      await this.events.record({
        ohid,
        eventType: EVENT_TYPES.SYNC_COMPLETED,
        payload: { ...result },
        sourceSystem: this.options.remoteSystem,
      });
      console.log('[sync] Reconciled', {
        ohid,
        direction,
        status: result.status,
        remoteId: result.remoteId,
        pulled: result.pulled,
        pushed: result.pushed,
        conflicts: result.conflicts.length,
      });
      return result;
    } catch (err) {
      console.error('[sync] Reconcile failed', { ohid, direction, error: describeError(err) });
      try {
        await this.events.record({
          ohid,
          eventType: EVENT_TYPES.SYNC_FAILED,
          payload: {
            direction,
            errorName: err instanceof Error ? err.name : 'Error',
            error: describeError(err),
          },
          sourceSystem: this.options.remoteSystem,
        });
      } catch (recordErr) {
        console.error('[sync] Could not record SyncFailed', { ohid, error: describeError(recordErr) });
      }
      throw err;
    }
  }

  // --------------------------------------------------------------------------
  // Core
  // --------------------------------------------------------------------------

  private async run(ohid: string, direction: SyncDirection): Promise<SyncResult> {
    const startedAt = this.now();
    const identity = await this.repo.getIdentity(ohid);
    if (!identity) {
      throw new Error(`Unknown identity ${ohid}`);
    }

    const link = await this.repo.getSyncLink(ohid, this.options.remoteSystem);
    const remote = await this.locateRemote(identity, link);
    const attribution = await this.originatingSource(ohid);

    if (!remote) {
      if (direction === 'inbound') {
        return emptyResult(ohid, direction, 'not_found', null);
      }
      return this.createRemote(identity, direction, attribution, startedAt);
    }

    // A stale link to a different record is replaced, so its digest no longer applies
    const activeLink = link && link.remoteId === remote.id ? link : null;
    const local = pickAttributes(identity);
    const remoteValues = this.remoteAttributes(remote);
    const localChangedAt = await this.localChangeTimes(ohid);
    const taggedByUs = remote.fields[this.options.attributionField] === attribution;

    const pulled: Partial<IdentityAttributes> = {};
    const pushed: Record<string, string> = {};
    const conflicts: ConflictDecision[] = [];

    for (const field of IDENTITY_FIELDS) {
      const localValue = local[field];
      const remoteValue = remoteValues[field];
      if (localValue === remoteValue) continue;

      let action: FieldAction;
      if (direction === 'inbound') {
        action = 'pull';
      } else if (direction === 'outbound') {
        action = 'push';
      } else {
        const remoteChanged = activeLink
          ? fieldDigest(remote.fields[CRM_FIELDS[field]]) !== (activeLink.remoteDigest[field] ?? null)
          : remoteValue !== null && !taggedByUs;
        const changedAt = localChangedAt.get(field) ?? null;
        const localChanged = activeLink
          ? changedAt !== null && changedAt.getTime() > activeLink.lastSyncedAt.getTime()
          : localValue !== null;

        if (remoteChanged && localChanged) {
          const decision = decideConflict(field, changedAt, remote.modifiedTime);
          conflicts.push(decision);
          action = decision.winner === 'local' ? 'push' : 'pull';
        } else if (remoteChanged) {
          action = 'pull';
        } else if (localChanged) {
          action = 'push';
        } else {
          action = 'none';
        }
      }

      // Null never overwrites
      if (action === 'pull' && remoteValue !== null) pulled[field] = remoteValue;
      if (action === 'push' && localValue !== null) pushed[CRM_FIELDS[field]] = localValue;
    }

    for (const decision of conflicts) {
      await this.events.record({
        ohid,
        eventType: EVENT_TYPES.SYNC_CONFLICT_RESOLVED,
        payload: { ...decision },
        sourceSystem: this.options.remoteSystem,
      });
      console.log('[sync] Conflict resolved', { ohid, ...decision });
    }

    const pulledFields = await this.applyLocal(ohid, pulled);

    const pushedFields = IDENTITY_FIELDS.filter((field) => CRM_FIELDS[field] in pushed);
    const finalRemote: Record<string, string | null> = { ...remote.fields };
    if (pushedFields.length > 0) {
      const write = { ...pushed, [this.options.attributionField]: attribution };
      await this.crm.updateRecord(remote.id, write);
      Object.assign(finalRemote, write);
    }

    await this.repo.upsertSyncLink({
      ohid,
      remoteSystem: this.options.remoteSystem,
      remoteId: remote.id,
      lastSyncedAt: startedAt,
      remoteDigest: digestFields(projectIdentityFields(finalRemote)),
    });

    const changed = pulledFields.length > 0 || pushedFields.length > 0 || activeLink === null;
    return {
      ohid,
      direction,
      status: changed ? 'synced' : 'unchanged',
      remoteId: remote.id,
      created: false,
      pulled: pulledFields,
      pushed: pushedFields,
      conflicts,
    };
  }

  private async createRemote(
    identity: CanonicalIdentity,
    direction: SyncDirection,
    attribution: string,
    startedAt: Date,
  ): Promise<SyncResult> {
    const fields: Record<string, string> = {};
    const pushed: IdentityField[] = [];
    for (const field of IDENTITY_FIELDS) {
      const value = identity[field];
      if (value !== null) {
        fields[CRM_FIELDS[field]] = value;
        pushed.push(field);
      }
    }
    // The CRM requires a last name on create
    if (!fields[CRM_FIELDS.lastName]) {
      fields[CRM_FIELDS.lastName] = this.options.lastNamePlaceholder;
    }
    fields[this.options.attributionField] = attribution;

    const write = await this.crm.createRecord(fields);
    await this.repo.upsertSyncLink({
      ohid: identity.ohid,
      remoteSystem: this.options.remoteSystem,
      remoteId: write.id,
      lastSyncedAt: startedAt,
      remoteDigest: digestFields(projectIdentityFields(fields)),
    });

    console.log('[sync] Remote record created', { ohid: identity.ohid, remoteId: write.id });
    return {
      ohid: identity.ohid,
      direction,
      status: 'synced',
      remoteId: write.id,
      created: true,
      pulled: [],
      pushed,
      conflicts: [],
    };
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async locateRemote(identity: CanonicalIdentity, link: SyncLink | null): Promise<CrmRecord | null> {
    if (link) {
      const linked = await this.crm.getRecord(link.remoteId);
      if (linked) return linked;
      console.warn('[sync] Linked remote record no longer exists, searching again', {
        ohid: identity.ohid,
        remoteId: link.remoteId,
      });
    }
    if (identity.email) {
      const byEmail = await this.crm.search({ email: identity.email });
      if (byEmail) return byEmail;
    }
    if (identity.phone) {
      return this.crm.search({ phone: identity.phone });
    }
    return null;
  }

  /** Source system of the identity's first ingested lead */
  private async originatingSource(ohid: string): Promise<string> {
    const contexts = await this.repo.listLeadContexts(ohid);
    return contexts[0]?.sourceSystem ?? this.options.defaultSource;
  }

  /** Newest local edit per field, ignoring edits this reconciler pulled in */
  private async localChangeTimes(ohid: string): Promise<Map<IdentityField, Date>> {
    const events = await this.repo.listWorkflowEvents(ohid, {
      eventTypes: [EVENT_TYPES.IDENTITY_CREATED, EVENT_TYPES.IDENTITY_ATTRIBUTES_CHANGED],
    });
    const times = new Map<IdentityField, Date>();
    for (const event of events) {
      if (event.payload.reason === SYNC_INBOUND_REASON) continue;
      const fields = event.payload.fields;
      if (typeof fields !== 'object' || fields === null) continue;
      for (const field of IDENTITY_FIELDS) {
        if (!(field in fields)) continue;
        const previous = times.get(field);
        if (!previous || event.occurredAt.getTime() >= previous.getTime()) {
          times.set(field, event.occurredAt);
        }
      }
    }
    return times;
  }

  private remoteAttributes(remote: CrmRecord): FieldValues {
    const lastName = normalizeName(remote.fields[CRM_FIELDS.lastName]);
    return {
      firstName: normalizeName(remote.fields[CRM_FIELDS.firstName]),
      lastName: lastName === this.options.lastNamePlaceholder ? null : lastName,
      email: normalizeEmail(remote.fields[CRM_FIELDS.email]),
      phone: normalizePhone(remote.fields[CRM_FIELDS.phone]),
    };
  }

  private async applyLocal(ohid: string, pulled: Partial<IdentityAttributes>): Promise<IdentityField[]> {
    if (Object.keys(pulled).length === 0) return [];

    const { changed } = await this.repo.updateIdentityAttributes(ohid, pulled, { onlyIfNull: false });

    for (const kind of ['email', 'phone'] as const) {
      const value = pulled[kind];
      if (!value) continue;
      const owner = await this.repo.claimContactKey(ohid, { kind, value });
      if (owner !== ohid) {
        console.warn('[sync] Pulled contact value is owned by another identity', { ohid, kind, owner });
      }
    }

    if (changed.length > 0) {
      const fields: Record<string, string> = {};
      for (const field of changed) {
        const value = pulled[field];
        if (value) fields[field] = value;
      }
      await this.events.record({
        ohid,
        eventType: EVENT_TYPES.IDENTITY_ATTRIBUTES_CHANGED,
        payload: { fields, reason: SYNC_INBOUND_REASON },
        sourceSystem: this.options.remoteSystem,
      });
    }
    return changed;
  }
}

// ============================================================================
// Pure helpers
// ============================================================================

function decideConflict(
  field: IdentityField,
  localChangedAt: Date | null,
  remoteModifiedAt: Date | null,
): ConflictDecision {
  const base = {
    field,
    localChangedAt: localChangedAt?.toISOString() ?? null,
    remoteModifiedAt: remoteModifiedAt?.toISOString() ?? null,
  };
  if (!localChangedAt || !remoteModifiedAt) {
    return { ...base, winner: 'remote', reason: 'timestamp-missing' };
  }
  if (localChangedAt.getTime() > remoteModifiedAt.getTime()) {
    return { ...base, winner: 'local', reason: 'local-newer' };
  }
  return { ...base, winner: 'remote', reason: 'remote-newer-or-equal' };
}

function pickAttributes(identity: CanonicalIdentity): FieldValues {
  return {
    firstName: identity.firstName,
    lastName: identity.lastName,
    email: identity.email,
    phone: identity.phone,
  };
}

/** CRM field map → identity-field-keyed values, for the digest */
function projectIdentityFields(remote: Record<string, string | null>): Record<string, string | null> {
  const projected: Record<string, string | null> = {};
  for (const field of IDENTITY_FIELDS) {
    projected[field] = remote[CRM_FIELDS[field]] ?? null;
  }
  return projected;
}

function emptyResult(
  ohid: string,
  direction: SyncDirection,
  status: SyncResult['status'],
  remoteId: string | null,
): SyncResult {
  return { ohid, direction, status, remoteId, created: false, pulled: [], pushed: [], conflicts: [] };
}
