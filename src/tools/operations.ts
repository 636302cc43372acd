/**
 * Operation contracts exposed through POST /tools/:name.
 *
 * Each entry pairs zod request/response schemas with a handler over the
 * engine components. buildOperations is called once in src/index.ts; the
 * registry checks the set against REQUIRED_OPERATIONS.
 */

import { z } from 'zod';
import type { TokenManager } from '../auth/token-manager.js';
import type { CrmClient } from '../crm/client.js';
import type { IdentityResolver } from '../identity/resolver.js';
import type { LeadIngestService } from '../ingest/lead-ingest.js';
import { leadIngestSchema } from '../ingest/types.js';
import type { EventLog } from '../store/event-log.js';
import type { CanonicalIdentity } from '../store/types.js';
import type { SyncReconciler } from '../sync/reconciler.js';
import { SYNC_DIRECTIONS } from '../sync/types.js';
import type { SignatureVerifier } from '../webhook/signature.js';
import { defineOperation } from './registry.js';
import type { RegisteredOperation } from './registry.js';

export const REQUIRED_OPERATIONS = [
  'resolve_identity',
  'record_event',
  'verify_signature',
  'get_access_token',
  'reconcile',
  'ingest_lead',
  'lookup_identity',
  'get_crm_record',
] as const;

export interface OperationDeps {
  resolver: IdentityResolver;
  events: EventLog;
  verifier: SignatureVerifier;
  tokens: Pick<TokenManager, 'getToken'>;
  reconciler: Pick<SyncReconciler, 'reconcile'>;
  ingest: Pick<LeadIngestService, 'ingest'>;
  crm: Pick<CrmClient, 'getRecord'>;
}

// ============================================================================
// Shared schemas
// ============================================================================

const identityFieldSchema = z.enum(['firstName', 'lastName', 'email', 'phone']);

const identitySchema = z.object({
  ohid: z.string(),
  firstName: z.string().nullable(),
  lastName: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const syncResultSchema = z.object({
  ohid: z.string(),
  direction: z.enum(SYNC_DIRECTIONS),
  status: z.enum(['synced', 'unchanged', 'not_found']),
  remoteId: z.string().nullable(),
  created: z.boolean(),
  pulled: z.array(identityFieldSchema),
  pushed: z.array(identityFieldSchema),
  conflicts: z.array(
    z.object({
      field: identityFieldSchema,
      winner: z.enum(['local', 'remote']),
      localChangedAt: z.string().nullable(),
      remoteModifiedAt: z.string().nullable(),
      reason: z.enum(['local-newer', 'remote-newer-or-equal', 'timestamp-missing']),
    }),
  ),
});

function serializeIdentity(identity: CanonicalIdentity): z.input<typeof identitySchema> {
  return {
    ohid: identity.ohid,
    firstName: identity.firstName,
    lastName: identity.lastName,
    email: identity.email,
    phone: identity.phone,
    createdAt: identity.createdAt.toISOString(),
    updatedAt: identity.updatedAt.toISOString(),
  };
}

// ============================================================================
// Operations
// ============================================================================

export function buildOperations(deps: OperationDeps): RegisteredOperation[] {
  return [
    defineOperation({
      name: 'resolve_identity',
      description: 'Map a contact to its canonical identity, creating one when nothing matches',
      request: z.object({
        firstName: z.string().optional(),
        lastName: z.string().optional(),
        email: z.string().optional(),
        phone: z.string().optional(),
        sourceSystem: z.string().min(1).default('TOOLS'),
      }),
      response: z.object({
        ohid: z.string(),
        created: z.boolean(),
        matchedBy: z.enum(['email', 'phone']).nullable(),
        collision: z.object({ emailOhid: z.string(), phoneOhid: z.string() }).nullable(),
      }),
      handler: async ({ sourceSystem, ...contact }) => {
        const result = await deps.resolver.resolve(contact, sourceSystem);
        return {
          ohid: result.ohid,
          created: result.created,
          matchedBy: result.matchedBy,
          collision: result.collision,
        };
      },
    }),

    defineOperation({
      name: 'record_event',
      description: 'Append a workflow event to the identity timeline',
      request: z.object({
        ohid: z.string().uuid().nullable(),
        eventType: z.string().min(1).max(100),
        payload: z.record(z.unknown()).default({}),
        sourceSystem: z.string().min(1).max(50),
        occurredAt: z.string().datetime({ offset: true }).optional(),
      }),
      response: z.object({ eventId: z.string() }),
      handler: async (input) => {
        const event = await deps.events.record({
          ohid: input.ohid,
          eventType: input.eventType,
          payload: input.payload,
          sourceSystem: input.sourceSystem,
          occurredAt: input.occurredAt ? new Date(input.occurredAt) : undefined,
        });
        return { eventId: event.id };
      },
    }),

    defineOperation({
      name: 'verify_signature',
      description: 'Check a webhook body and headers against the configured source secret',
      request: z.object({
        source: z.string().min(1),
        headers: z.record(z.string()),
        body: z.string(),
      }),
      response: z.object({ valid: z.boolean(), reason: z.string().optional() }),
      handler: async ({ source, headers, body }) => {
        const result = deps.verifier.verify(source, headers, body);
        return result.valid ? { valid: true } : { valid: false, reason: result.reason };
      },
    }),

    defineOperation({
      name: 'get_access_token',
      description: 'Return a valid CRM access token, refreshing when needed',
      request: z.object({}).strict(),
      response: z.object({ accessToken: z.string() }),
      handler: async () => ({ accessToken: await deps.tokens.getToken() }),
    }),

    defineOperation({
      name: 'reconcile',
      description: 'Synchronise an identity with its CRM record',
      request: z.object({
        ohid: z.string().uuid(),
        direction: z.enum(SYNC_DIRECTIONS).default('bidirectional'),
      }),
      response: syncResultSchema,
      handler: async ({ ohid, direction }) => deps.reconciler.reconcile(ohid, direction),
    }),

    defineOperation({
      name: 'ingest_lead',
      description: 'Resolve, persist and schedule sync for an inbound lead',
      request: leadIngestSchema,
      response: z.object({
        ohid: z.string(),
        ingestId: z.string(),
        sourceSystem: z.string(),
        status: z.enum(['ingested', 'duplicate']),
        created: z.boolean(),
        syncJobId: z.string().nullable(),
      }),
      handler: async (lead) => deps.ingest.ingest(lead),
    }),

    defineOperation({
      name: 'lookup_identity',
      description: 'Find an existing identity by email, then phone, without creating one',
      request: z
        .object({ email: z.string().optional(), phone: z.string().optional() })
        .refine((q) => Boolean(q.email || q.phone), { message: 'At least one of email or phone is required' }),
      response: z.object({ found: z.boolean(), identity: identitySchema.optional() }),
      handler: async (query) => {
        const identity = await deps.resolver.lookup(query);
        return identity ? { found: true, identity: serializeIdentity(identity) } : { found: false };
      },
    }),

    defineOperation({
      name: 'get_crm_record',
      description: 'Fetch one CRM record by id',
      request: z.object({ remoteId: z.string().min(1) }),
      response: z.object({
        found: z.boolean(),
        record: z
          .object({
            id: z.string(),
            fields: z.record(z.string().nullable()),
            modifiedTime: z.string().nullable(),
          })
          .optional(),
      }),
      handler: async ({ remoteId }) => {
        const record = await deps.crm.getRecord(remoteId);
        if (!record) return { found: false };
        return {
          found: true,
          record: {
            id: record.id,
            fields: record.fields,
            modifiedTime: record.modifiedTime?.toISOString() ?? null,
          },
        };
      },
    }),
  ];
}
