/**
 * Event Log — append-and-publish for workflow events
 *
 * Every workflow event is appended to the repository first. When a publisher
 * is configured (WORKFLOW_WEBHOOK_URL), the event is then forwarded to the
 * downstream workflow consumers. Publishing is best effort: a failure is
 * logged and never undoes or fails the append.
 */

import { createHash, randomUUID } from 'node:crypto';
import { describeError } from '../errors.js';
import type { Repository, WorkflowEventRecord } from './types.js';

export const EVENT_TYPES = {
  LEAD_INGESTED: 'LeadIngested',
  IDENTITY_CREATED: 'IdentityCreated',
  IDENTITY_ATTRIBUTES_CHANGED: 'IdentityAttributesChanged',
  IDENTITY_COLLISION: 'IdentityCollision',
  CALL_RECEIVED: 'CallReceived',
  CALL_COMPLETED: 'CallCompleted',
  NOTION_EVENT: 'NotionEvent',
  SYNC_COMPLETED: 'SyncCompleted',
  SYNC_FAILED: 'SyncFailed',
  SYNC_CONFLICT_RESOLVED: 'SyncConflictResolved',
} as const;

/**
 * UUID-shaped id derived from the given parts, so a provider event delivered
 * twice maps to one stored event.
 */
export function stableEventId(...parts: string[]): string {
  const hex = createHash('sha256').update(parts.join('\u0000')).digest('hex');
  // Version 5 layout with the RFC 4122 variant bits
  const variant = ((parseInt(hex[16], 16) & 0x3) | 0x8).toString(16);
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-5${hex.slice(13, 16)}-${variant}${hex.slice(17, 20)}-${hex.slice(20, 32)}`;
}

export interface RecordEventInput {
  ohid: string | null;
  eventType: string;
  payload: Record<string, unknown>;
  sourceSystem: string;
  /** Defaults to now; callers replaying provider events may pass their own */
  occurredAt?: Date;
  /** Defaults to a fresh UUID */
  id?: string;
}

export interface EventPublisher {
  publish(event: WorkflowEventRecord): Promise<void>;
}

export class EventLog {
  constructor(
    private readonly repo: Repository,
    private readonly publisher: EventPublisher | null = null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Repeating an event id is a no-op: the stored event is returned, nothing is republished */
  async record(input: RecordEventInput): Promise<WorkflowEventRecord> {
    const { inserted, event } = await this.repo.appendWorkflowEvent({
      id: input.id ?? randomUUID(),
      ohid: input.ohid,
      eventType: input.eventType,
      payload: input.payload,
      sourceSystem: input.sourceSystem,
      occurredAt: input.occurredAt ?? this.now(),
    });

    if (inserted && this.publisher) {
      try {
        await this.publisher.publish(event);
      } catch (err) {
        console.error('[events] Publish failed (event is persisted)', {
          eventId: event.id,
          eventType: event.eventType,
          error: describeError(err),
        });
      }
    }

    return event;
  }
}
