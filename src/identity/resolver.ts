// ============================================================================
// Identity Resolver — contact tuple → canonical identity (OHID)
// ============================================================================
//
// Matching order:
//   1. Normalised email against confirmed email keys
//   2. Normalised phone against confirmed phone keys
// When both match different identities, email wins. Both identities stay
// distinct (no merge); an IdentityCollision event is recorded for review.
//
// Creation never does check-then-insert. It calls the repository's atomic
// insertIdentityIfAbsent, which writes the identity and claims its contact
// keys together or not at all. A lost race re-runs the lookup, which then
// finds the winner, so concurrent ingestions of one new contact converge on
// a single identity.
//
// Enrichment is monotonic: null attributes are filled, non-null attributes
// are never overwritten and never set back to null.

import { randomUUID } from 'node:crypto';
import { DuplicateIdentityRaceError, TransientStorageError } from '../errors.js';
import { EVENT_TYPES } from '../store/event-log.js';
import type { EventLog } from '../store/event-log.js';
import type {
  CanonicalIdentity,
  ContactKey,
  IdentityAttributes,
  IdentityField,
  Repository,
} from '../store/types.js';
import { normalizeEmail, normalizeName, normalizePhone } from './normalize.js';

// ============================================================================
// Types
// ============================================================================

export interface ContactInput {
  firstName?: string | null;
  lastName?: string | null;
  email?: string | null;
  phone?: string | null;
}

export interface IdentityCollision {
  emailOhid: string;
  phoneOhid: string;
}

export interface ResolveResult {
  ohid: string;
  /** true when this call allocated the identity */
  created: boolean;
  matchedBy: 'email' | 'phone' | null;
  /** Set when email and phone point at different identities */
  collision: IdentityCollision | null;
  /** Attributes filled on an existing identity by this call */
  enriched: IdentityField[];
}

export interface IdentityResolverOptions {
  /** Lookup → insert rounds before giving up on a contended contact */
  maxAttempts?: number;
  now?: () => Date;
  newId?: () => string;
}

// ============================================================================
// Resolver
// ============================================================================

export class IdentityResolver {
  private readonly maxAttempts: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly repo: Repository,
    private readonly events: EventLog,
    options: IdentityResolverOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Resolve a contact to an identity, creating one if no confirmed email or
   * phone matches.
   *
   * @param sourceSystem - recorded on the identity events this call appends
   */
  async resolve(contact: ContactInput, sourceSystem: string): Promise<ResolveResult> {
    const attributes = normalizeContact(contact);
    const keys = contactKeys(attributes);
    let lastRace: DuplicateIdentityRaceError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const byEmail = attributes.email
        ? await this.repo.findIdentityByKey({ kind: 'email', value: attributes.email })
        : null;
      const byPhone = attributes.phone
        ? await this.repo.findIdentityByKey({ kind: 'phone', value: attributes.phone })
        : null;

      const match = byEmail ?? byPhone;
      if (match) {
        return this.resolveExisting(match, byEmail, byPhone, attributes, keys, sourceSystem);
      }

      const now = this.now();
      const candidate: CanonicalIdentity = { ohid: this.newId(), ...attributes, createdAt: now, updatedAt: now };
      const result = await this.repo.insertIdentityIfAbsent(candidate, keys);

      if (result.inserted) {
        await this.events.record({
          ohid: candidate.ohid,
          eventType: EVENT_TYPES.IDENTITY_CREATED,
          payload: { fields: definedFields(attributes) },
          sourceSystem,
          occurredAt: now,
        });
        console.log('[identity] Created', { ohid: candidate.ohid, keys: keys.map((k) => k.kind) });
        return { ohid: candidate.ohid, created: true, matchedBy: null, collision: null, enriched: [] };
      }

      lastRace = new DuplicateIdentityRaceError(result.conflictingOhid);
      console.log('[identity] Creation race lost, re-reading winner', {
        attempt,
        winningOhid: result.conflictingOhid,
      });
    }

    // The winner never became readable within the bound; the caller may retry the whole call
    throw new TransientStorageError(
      `Identity creation stayed contended after ${this.maxAttempts} attempts`,
      lastRace,
    );
  }

  /** Read-only lookup: email first, then phone. Never creates. */
  async lookup(contact: Pick<ContactInput, 'email' | 'phone'>): Promise<CanonicalIdentity | null> {
    const email = normalizeEmail(contact.email);
    if (email) {
      const byEmail = await this.repo.findIdentityByKey({ kind: 'email', value: email });
      if (byEmail) return byEmail;
    }
    const phone = normalizePhone(contact.phone);
    if (phone) {
      return this.repo.findIdentityByKey({ kind: 'phone', value: phone });
    }
    return null;
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private async resolveExisting(
    match: CanonicalIdentity,
    byEmail: CanonicalIdentity | null,
    byPhone: CanonicalIdentity | null,
    attributes: IdentityAttributes,
    keys: ContactKey[],
    sourceSystem: string,
  ): Promise<ResolveResult> {
    let collision: IdentityCollision | null =
      byEmail && byPhone && byEmail.ohid !== byPhone.ohid
        ? { emailOhid: byEmail.ohid, phoneOhid: byPhone.ohid }
        : null;

    // Claim contact values nobody owns yet; owned values stay with their owner
    for (const key of keys) {
      const owned = key.kind === 'email' ? byEmail : byPhone;
      if (owned) continue;
      const owner = await this.repo.claimContactKey(match.ohid, key);
      if (owner !== match.ohid && !collision) {
        collision = key.kind === 'email'
          ? { emailOhid: owner, phoneOhid: match.ohid }
          : { emailOhid: match.ohid, phoneOhid: owner };
      }
    }

    const { changed } = await this.repo.updateIdentityAttributes(match.ohid, attributes, { onlyIfNull: true });
    if (changed.length > 0) {
      const fields: Record<string, string> = {};
      for (const field of changed) {
        const value = attributes[field];
        if (value !== null) fields[field] = value;
      }
      await this.events.record({
        ohid: match.ohid,
        eventType: EVENT_TYPES.IDENTITY_ATTRIBUTES_CHANGED,
        payload: { fields, reason: 'enrichment' },
        sourceSystem,
      });
      console.log('[identity] Enriched', { ohid: match.ohid, fields: changed });
    }

    if (collision) {
      await this.events.record({
        ohid: match.ohid,
        eventType: EVENT_TYPES.IDENTITY_COLLISION,
        payload: { ...collision, chosen: match.ohid, rule: 'email-over-phone' },
        sourceSystem,
      });
      console.warn('[identity] Email and phone resolve to different identities — flagged for review', {
        chosen: match.ohid,
        ...collision,
      });
    }

    return {
      ohid: match.ohid,
      created: false,
      matchedBy: byEmail ? 'email' : 'phone',
      collision,
      enriched: changed,
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function normalizeContact(contact: ContactInput): IdentityAttributes {
  return {
    firstName: normalizeName(contact.firstName),
    lastName: normalizeName(contact.lastName),
    email: normalizeEmail(contact.email),
    phone: normalizePhone(contact.phone),
  };
}

function contactKeys(attributes: IdentityAttributes): ContactKey[] {
  const keys: ContactKey[] = [];
  if (attributes.email) keys.push({ kind: 'email', value: attributes.email });
  if (attributes.phone) keys.push({ kind: 'phone', value: attributes.phone });
  return keys;
}

function definedFields(attributes: IdentityAttributes): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [field, value] of Object.entries(attributes)) {
    if (typeof value === 'string') fields[field] = value;
  }
  return fields;
}
