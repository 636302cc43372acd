/**
 * Event Store Type Definitions
 *
 * Contract between the identity resolver, lead ingest, the sync reconciler
 * and the two repository implementations (Postgres and in-memory).
 */

export type ContactKeyKind = 'email' | 'phone';

/** A confirmed contact value claimed by exactly one identity */
export interface ContactKey {
  kind: ContactKeyKind;
  value: string;
}

/** Best-known contact attributes; null means "not yet known" */
export interface IdentityAttributes {
  firstName: string | null;
  lastName: string | null;
  email: string | null;
  phone: string | null;
}

export type IdentityField = keyof IdentityAttributes;

export const IDENTITY_FIELDS: readonly IdentityField[] = ['firstName', 'lastName', 'email', 'phone'];

export interface CanonicalIdentity extends IdentityAttributes {
  ohid: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface LeadContextRecord {
  id: string;
  ohid: string;
  sourceSystem: string;
  sourceLeadId: string;
  channel: string;
  payload: Record<string, unknown>;
  consent: Record<string, unknown> | null;
  createdAt: Date;
}

export interface NewWorkflowEvent {
  id: string;
  ohid: string | null;
  eventType: string;
  payload: Record<string, unknown>;
  sourceSystem: string;
  occurredAt: Date;
}

export interface WorkflowEventRecord extends NewWorkflowEvent {
  /** Store-assigned, strictly increasing append order */
  seq: number;
}

export interface SyncLink {
  ohid: string;
  remoteSystem: string;
  remoteId: string;
  lastSyncedAt: Date;
  /** Field name → SHA-256 hex of the last known remote value */
  remoteDigest: Record<string, string>;
}

export type InsertIdentityResult =
  | { inserted: true; identity: CanonicalIdentity }
  | { inserted: false; conflictingOhid: string };

export interface AppendEventResult {
  /** false when an event with the same id was already stored */
  inserted: boolean;
  event: WorkflowEventRecord;
}

export type InsertLeadContextResult =
  | { inserted: true }
  | { inserted: false; existing: LeadContextRecord };

export interface ListEventsOptions {
  eventTypes?: string[];
  since?: Date;
}

/**
 * Persistence seam for the engine.
 *
 * Implementations must make insertIdentityIfAbsent and claimContactKey atomic
 * with respect to the (kind, value) uniqueness of contact keys.
 */
export interface Repository {
  findIdentityByKey(key: ContactKey): Promise<CanonicalIdentity | null>;
  getIdentity(ohid: string): Promise<CanonicalIdentity | null>;

  /**
   * Insert the identity and claim every key, or change nothing.
   * On a lost claim returns the ohid that already owns the key.
   */
  insertIdentityIfAbsent(identity: CanonicalIdentity, keys: ContactKey[]): Promise<InsertIdentityResult>;

  /** Claim the key for ohid if unclaimed; returns the owning ohid either way */
  claimContactKey(ohid: string, key: ContactKey): Promise<string>;

  /**
   * Write each non-null attribute. With onlyIfNull, fields that already hold
   * a value are left alone. Returns the updated identity and the fields that
   * actually changed.
   */
  updateIdentityAttributes(
    ohid: string,
    attributes: Partial<IdentityAttributes>,
    options: { onlyIfNull: boolean },
  ): Promise<{ identity: CanonicalIdentity; changed: IdentityField[] }>;

  findLeadContext(sourceSystem: string, sourceLeadId: string): Promise<LeadContextRecord | null>;
  /** Idempotent on (sourceSystem, sourceLeadId) */
  insertLeadContext(record: LeadContextRecord): Promise<InsertLeadContextResult>;
  listLeadContexts(ohid: string): Promise<LeadContextRecord[]>;

  /** Idempotent on event id; a repeated id returns the stored event */
  appendWorkflowEvent(event: NewWorkflowEvent): Promise<AppendEventResult>;
  /** Events for one identity in append order */
  listWorkflowEvents(ohid: string, options?: ListEventsOptions): Promise<WorkflowEventRecord[]>;

  getSyncLink(ohid: string, remoteSystem: string): Promise<SyncLink | null>;
  upsertSyncLink(link: SyncLink): Promise<void>;

  close(): Promise<void>;
}
