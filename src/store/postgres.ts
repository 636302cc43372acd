/**
 * Postgres Repository
 *
 * Event Store backed by a shared `pg` pool. Single statements go through
 * pool.query (connection acquired and released per statement); multi-statement
 * work runs inside withClient, which always releases the client. No method
 * holds a connection beyond its own statements, so callers never keep one
 * across a remote CRM call.
 *
 * Connection-class failures are wrapped as TransientStorageError and retried
 * with bounded backoff before surfacing.
 */

import pg from 'pg';
import type { PoolClient, QueryResultRow } from 'pg';
import { TransientStorageError, describeError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import type { RetryOptions } from '../utils/retry.js';
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

// ============================================================================
// Row shapes
// ============================================================================

interface IdentityRow {
  ohid: string;
  first_name: string | null;
  last_name: string | null;
  email: string | null;
  phone: string | null;
  created_at: Date;
  updated_at: Date;
}

interface LeadContextRow {
  id: string;
  ohid: string;
  source_system: string;
  source_lead_id: string;
  channel: string;
  payload: Record<string, unknown>;
  consent: Record<string, unknown> | null;
  created_at: Date;
}

interface WorkflowEventRow {
  id: string;
  seq: string;
  ohid: string | null;
  event_type: string;
  payload: Record<string, unknown>;
  source_system: string;
  occurred_at: Date;
}

interface SyncLinkRow {
  ohid: string;
  remote_system: string;
  remote_id: string;
  last_synced_at: Date;
  remote_digest: Record<string, string>;
}

const COLUMN_BY_FIELD: Record<IdentityField, keyof IdentityRow> = {
  firstName: 'first_name',
  lastName: 'last_name',
  email: 'email',
  phone: 'phone',
};

function toIdentity(row: IdentityRow): CanonicalIdentity {
  return {
    ohid: row.ohid,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toLeadContext(row: LeadContextRow): LeadContextRecord {
  return {
    id: row.id,
    ohid: row.ohid,
    sourceSystem: row.source_system,
    sourceLeadId: row.source_lead_id,
    channel: row.channel,
    payload: row.payload,
    consent: row.consent,
    createdAt: row.created_at,
  };
}

function toWorkflowEvent(row: WorkflowEventRow): WorkflowEventRecord {
  return {
    id: row.id,
    seq: Number(row.seq),
    ohid: row.ohid,
    eventType: row.event_type,
    payload: row.payload,
    sourceSystem: row.source_system,
    occurredAt: row.occurred_at,
  };
}

// ============================================================================
// Transient error classification
// ============================================================================

const TRANSIENT_PG_CODES: ReadonlySet<string> = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
]);

const TRANSIENT_NODE_CODES: ReadonlySet<string> = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

export function isTransientPgError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : '';
  if (code.startsWith('08') || TRANSIENT_PG_CODES.has(code) || TRANSIENT_NODE_CODES.has(code)) {
    return true;
  }
  return /Connection terminated|timeout exceeded when trying to connect/i.test(err.message);
}

// ============================================================================
// Repository
// ============================================================================

export interface PostgresRepositoryOptions {
  connectionString: string;
  ssl: boolean;
  maxConnections: number;
  retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs'>;
}

export class PostgresRepository implements Repository {
  private readonly pool: pg.Pool;
  private readonly retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs'>;

  constructor(options: PostgresRepositoryOptions) {
    this.pool = new pg.Pool({
      connectionString: options.connectionString,
      max: options.maxConnections,
      ...(options.ssl ? { ssl: { rejectUnauthorized: false } } : {}),
    });
    this.retry = options.retry;

    // Idle-client errors would otherwise crash the process
    this.pool.on('error', (err) => {
      console.error('[store] Idle pg client error:', err.message);
    });
  }

  async findIdentityByKey(key: ContactKey): Promise<CanonicalIdentity | null> {
    const rows = await this.query<IdentityRow>(
      `SELECT i.* FROM contact_key k
         JOIN canonical_identity i ON i.ohid = k.ohid
        WHERE k.kind = $1 AND k.value = $2`,
      [key.kind, key.value],
    );
    return rows[0] ? toIdentity(rows[0]) : null;
  }

  async getIdentity(ohid: string): Promise<CanonicalIdentity | null> {
    const rows = await this.query<IdentityRow>('SELECT * FROM canonical_identity WHERE ohid = $1', [ohid]);
    return rows[0] ? toIdentity(rows[0]) : null;
  }

  async insertIdentityIfAbsent(identity: CanonicalIdentity, keys: ContactKey[]): Promise<InsertIdentityResult> {
    return this.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        const inserted = await client.query<IdentityRow>(
          `INSERT INTO canonical_identity (ohid, first_name, last_name, email, phone, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7)
           RETURNING *`,
          [
            identity.ohid,
            identity.firstName,
            identity.lastName,
            identity.email,
            identity.phone,
            identity.createdAt,
            identity.updatedAt,
          ],
        );

        for (const key of keys) {
          // Blocks behind a concurrent uncommitted claim, then either wins or sees its row
          const claimed = await client.query<{ ohid: string }>(
            `INSERT INTO contact_key (kind, value, ohid) VALUES ($1, $2, $3)
             ON CONFLICT (kind, value) DO NOTHING
             RETURNING ohid`,
            [key.kind, key.value, identity.ohid],
          );
          if (claimed.rowCount === 0) {
            const owner = await client.query<{ ohid: string }>(
              'SELECT ohid FROM contact_key WHERE kind = $1 AND value = $2',
              [key.kind, key.value],
            );
            await client.query('ROLLBACK');
            return { inserted: false, conflictingOhid: owner.rows[0]?.ohid ?? '' };
          }
        }

        await client.query('COMMIT');
        return { inserted: true, identity: toIdentity(inserted.rows[0]) };
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    });
  }

  async claimContactKey(ohid: string, key: ContactKey): Promise<string> {
    const claimed = await this.query<{ ohid: string }>(
      `INSERT INTO contact_key (kind, value, ohid) VALUES ($1, $2, $3)
       ON CONFLICT (kind, value) DO NOTHING
       RETURNING ohid`,
      [key.kind, key.value, ohid],
    );
    if (claimed[0]) return claimed[0].ohid;

    const owner = await this.query<{ ohid: string }>(
      'SELECT ohid FROM contact_key WHERE kind = $1 AND value = $2',
      [key.kind, key.value],
    );
    return owner[0]?.ohid ?? ohid;
  }

  async updateIdentityAttributes(
    ohid: string,
    attributes: Partial<IdentityAttributes>,
    options: { onlyIfNull: boolean },
  ): Promise<{ identity: CanonicalIdentity; changed: IdentityField[] }> {
    return this.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        const current = await client.query<IdentityRow>(
          'SELECT * FROM canonical_identity WHERE ohid = $1 FOR UPDATE',
          [ohid],
        );
        const row = current.rows[0];
        if (!row) {
          throw new Error(`Identity ${ohid} not found`);
        }

        const changed: IdentityField[] = [];
        const assignments: string[] = [];
        const params: unknown[] = [ohid];
        for (const field of IDENTITY_FIELDS) {
          const next = attributes[field];
          const column = COLUMN_BY_FIELD[field];
          if (next === undefined || next === null) continue;
          if (options.onlyIfNull && row[column] !== null) continue;
          if (row[column] === next) continue;
          params.push(next);
          assignments.push(`${column} = $${params.length}`);
          changed.push(field);
        }

        if (changed.length === 0) {
          await client.query('COMMIT');
          return { identity: toIdentity(row), changed };
        }

        const updated = await client.query<IdentityRow>(
          `UPDATE canonical_identity SET ${assignments.join(', ')}, updated_at = now()
            WHERE ohid = $1 RETURNING *`,
          params,
        );
        await client.query('COMMIT');
        return { identity: toIdentity(updated.rows[0]), changed };
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    });
  }

  async findLeadContext(sourceSystem: string, sourceLeadId: string): Promise<LeadContextRecord | null> {
    const rows = await this.query<LeadContextRow>(
      'SELECT * FROM lead_context WHERE source_system = $1 AND source_lead_id = $2',
      [sourceSystem, sourceLeadId],
    );
    return rows[0] ? toLeadContext(rows[0]) : null;
  }

  async insertLeadContext(record: LeadContextRecord): Promise<InsertLeadContextResult> {
    const inserted = await this.query<{ id: string }>(
      `INSERT INTO lead_context
          (id, ohid, source_system, source_lead_id, channel, payload, consent, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (source_system, source_lead_id) DO NOTHING
       RETURNING id`,
      [
        record.id,
        record.ohid,
        record.sourceSystem,
        record.sourceLeadId,
        record.channel,
        JSON.stringify(record.payload),
        record.consent === null ? null : JSON.stringify(record.consent),
        record.createdAt,
      ],
    );
    if (inserted[0]) return { inserted: true };

    const existing = await this.findLeadContext(record.sourceSystem, record.sourceLeadId);
    if (!existing) {
      throw new TransientStorageError('Lead context conflict row vanished before it could be read');
    }
    return { inserted: false, existing };
  }

  async listLeadContexts(ohid: string): Promise<LeadContextRecord[]> {
    const rows = await this.query<LeadContextRow>(
      'SELECT * FROM lead_context WHERE ohid = $1 ORDER BY created_at',
      [ohid],
    );
    return rows.map(toLeadContext);
  }

  async appendWorkflowEvent(event: NewWorkflowEvent): Promise<AppendEventResult> {
    const inserted = await this.query<WorkflowEventRow>(
      `INSERT INTO workflow_event (id, ohid, event_type, payload, occurred_at, source_system)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (id) DO NOTHING
       RETURNING *`,
      [event.id, event.ohid, event.eventType, JSON.stringify(event.payload), event.occurredAt, event.sourceSystem],
    );
    if (inserted[0]) {
      return { inserted: true, event: toWorkflowEvent(inserted[0]) };
    }

    const existing = await this.query<WorkflowEventRow>('SELECT * FROM workflow_event WHERE id = $1', [event.id]);
    if (!existing[0]) {
      throw new TransientStorageError('Workflow event vanished after id conflict');
    }
    return { inserted: false, event: toWorkflowEvent(existing[0]) };
  }

  async listWorkflowEvents(ohid: string, options: ListEventsOptions = {}): Promise<WorkflowEventRecord[]> {
    const rows = await this.query<WorkflowEventRow>(
      `SELECT * FROM workflow_event
        WHERE ohid = $1
          AND ($2::text[] IS NULL OR event_type = ANY($2))
          AND ($3::timestamptz IS NULL OR occurred_at > $3)
        ORDER BY occurred_at, seq`,
      [ohid, options.eventTypes ?? null, options.since ?? null],
    );
    return rows.map(toWorkflowEvent);
  }

  async getSyncLink(ohid: string, remoteSystem: string): Promise<SyncLink | null> {
    const rows = await this.query<SyncLinkRow>(
      'SELECT * FROM sync_link WHERE ohid = $1 AND remote_system = $2',
      [ohid, remoteSystem],
    );
    const row = rows[0];
    if (!row) return null;
    return {
      ohid: row.ohid,
      remoteSystem: row.remote_system,
      remoteId: row.remote_id,
      lastSyncedAt: row.last_synced_at,
      remoteDigest: row.remote_digest,
    };
  }

  async upsertSyncLink(link: SyncLink): Promise<void> {
    await this.query(
      `INSERT INTO sync_link (ohid, remote_system, remote_id, last_synced_at, remote_digest)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (ohid, remote_system) DO UPDATE
         SET remote_id = EXCLUDED.remote_id,
             last_synced_at = EXCLUDED.last_synced_at,
             remote_digest = EXCLUDED.remote_digest`,
      [link.ohid, link.remoteSystem, link.remoteId, link.lastSyncedAt, JSON.stringify(link.remoteDigest)],
    );
  }

  /** Apply schema.sql (or any DDL script) in one round trip. */
  async applySchema(sql: string): Promise<void> {
    await this.withClient(async (client) => {
      await client.query(sql);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async query<R extends QueryResultRow>(text: string, params: unknown[]): Promise<R[]> {
    return this.guard(async () => {
      const result = await this.pool.query<R>(text, params);
      return result.rows;
    });
  }

  /** Scoped acquisition: the client is released whatever the callback does. */
  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.guard(async () => {
      const client = await this.pool.connect();
      try {
        return await fn(client);
      } finally {
        client.release();
      }
    });
  }

  private guard<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          if (isTransientPgError(err)) {
            throw new TransientStorageError(`Storage unavailable: ${describeError(err)}`, err);
          }
          throw err;
        }
      },
      {
        ...this.retry,
        shouldRetry: (err) => err instanceof TransientStorageError,
        onRetry: (err, attempt, delayMs) => {
          console.warn('[store] Transient storage error, retrying', {
            attempt,
            delayMs,
            error: describeError(err),
          });
        },
      },
    );
  }
}
