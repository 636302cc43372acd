// ============================================================================
// Lead Ingest — resolve → persist context → append event → schedule sync
// ============================================================================
//
// Callers hand in an already-verified, validated lead. The pipeline:
//   1. Look up (sourceSystem, sourceLeadId); a redelivery stops here as
//      'duplicate' without touching identities
//   2. Resolve the person to an identity (creates or enriches)
//   3. Insert the lead context; a concurrent first delivery that lost the
//      unique-key race is also reported as 'duplicate'
//   4. Append LeadIngested with the ingest id as its event id
//   5. Schedule a reconciliation (deduplicated per source lead by BullMQ)
//
// Step 5 also runs for duplicates, so a delivery that failed after step 4
// gets its sync scheduled when the provider retries.

import { randomUUID } from 'node:crypto';
import type { IdentityResolver } from '../identity/resolver.js';
import { EVENT_TYPES } from '../store/event-log.js';
import type { EventLog } from '../store/event-log.js';
import type { LeadContextRecord, Repository } from '../store/types.js';
import type { SyncDirection } from '../sync/types.js';
import type { SyncJobData } from '../webhook/types.js';
import type { IngestResult, LeadIngestRequest } from './types.js';

/** Hands a sync job to the queue; returns the job id */
export type SyncScheduler = (data: SyncJobData) => Promise<string>;

export interface LeadIngestOptions {
  /** null disables ingest-triggered sync */
  scheduleSync: SyncScheduler | null;
  syncDirection: SyncDirection;
  now?: () => Date;
  newId?: () => string;
}

export class LeadIngestService {
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly repo: Repository,
    private readonly resolver: IdentityResolver,
    private readonly events: EventLog,
    private readonly options: LeadIngestOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  async ingest(lead: LeadIngestRequest): Promise<IngestResult> {
    const delivered = await this.repo.findLeadContext(lead.sourceSystem, lead.sourceLeadId);
    if (delivered) {
      return this.duplicate(delivered, lead, this.now());
    }

    const resolution = await this.resolver.resolve(lead.person, lead.sourceSystem);
    const ingestId = this.newId();
    const receivedAt = this.now();

    const insert = await this.repo.insertLeadContext({
      id: ingestId,
      ohid: resolution.ohid,
      sourceSystem: lead.sourceSystem,
      sourceLeadId: lead.sourceLeadId,
      channel: lead.channel,
      payload: lead,
      consent: lead.consent,
      createdAt: receivedAt,
    });

    if (!insert.inserted) {
      return this.duplicate(insert.existing, lead, receivedAt);
    }

    await this.events.record({
      id: ingestId,
      ohid: resolution.ohid,
      eventType: EVENT_TYPES.LEAD_INGESTED,
      payload: { ingestId, ohid: resolution.ohid, lead },
      sourceSystem: lead.sourceSystem,
      occurredAt: receivedAt,
    });

    const syncJobId = await this.schedule(resolution.ohid, lead, receivedAt);

    console.log('[ingest] Lead ingested', {
      ohid: resolution.ohid,
      ingestId,
      sourceSystem: lead.sourceSystem,
      channel: lead.channel,
      created: resolution.created,
      matchedBy: resolution.matchedBy,
    });

    return {
      ohid: resolution.ohid,
      ingestId,
      sourceSystem: lead.sourceSystem,
      status: 'ingested',
      created: resolution.created,
      syncJobId,
    };
  }

  private async duplicate(
    existing: LeadContextRecord,
    lead: LeadIngestRequest,
    receivedAt: Date,
  ): Promise<IngestResult> {
    console.log('[ingest] Duplicate delivery — lead context already stored', {
      sourceSystem: lead.sourceSystem,
      ingestId: existing.id,
    });
    const syncJobId = await this.schedule(existing.ohid, lead, receivedAt);
    return {
      ohid: existing.ohid,
      ingestId: existing.id,
      sourceSystem: lead.sourceSystem,
      status: 'duplicate',
      created: false,
      syncJobId,
    };
  }

  private async schedule(ohid: string, lead: LeadIngestRequest, receivedAt: Date): Promise<string | null> {
    if (!this.options.scheduleSync) return null;
    return this.options.scheduleSync({
      ohid,
      direction: this.options.syncDirection,
      sourceSystem: lead.sourceSystem,
      sourceLeadId: lead.sourceLeadId,
      receivedAt: receivedAt.toISOString(),
    });
  }
}
