/**
 * Telephony call events → workflow events
 *
 * Ringing and started calls become CallReceived; every later stage becomes
 * CallCompleted. The event is linked to an existing identity when the
 * caller's number (the far end of the call) resolves to one. Calls never
 * create identities.
 */

import type { IdentityResolver } from '../identity/resolver.js';
import { EVENT_TYPES, stableEventId } from '../store/event-log.js';
import type { EventLog } from '../store/event-log.js';
import type { CloudTalkEvent } from '../webhook/types.js';

export const TELEPHONY_SOURCE = 'CLOUDTALK';

const RECEIVED_STAGES: ReadonlySet<string> = new Set(['call.started', 'call.ringing']);

export interface CallEventResult {
  eventId: string;
  eventType: string;
  ohid: string | null;
}

export class TelephonyEvents {
  constructor(
    private readonly resolver: Pick<IdentityResolver, 'lookup'>,
    private readonly events: EventLog,
  ) {}

  async record(call: CloudTalkEvent): Promise<CallEventResult> {
    const eventType = RECEIVED_STAGES.has(call.event_type)
      ? EVENT_TYPES.CALL_RECEIVED
      : EVENT_TYPES.CALL_COMPLETED;
    const direction = call.direction.toUpperCase();
    const farEnd = direction === 'OUTBOUND' ? call.to_number : call.from_number;

    const identity = farEnd ? await this.resolver.lookup({ phone: farEnd }) : null;
    const ohid = identity?.ohid ?? null;

    const event = await this.events.record({
      id: stableEventId(TELEPHONY_SOURCE, call.call_id, call.event_type),
      ohid,
      eventType,
      payload: {
        providerEventType: call.event_type,
        call: {
          callId: call.call_id,
          direction,
          from: call.from_number ?? null,
          to: call.to_number ?? null,
          recordingUrl: call.recording_url ?? null,
          durationSeconds: call.duration ?? null,
        },
        ohid,
      },
      sourceSystem: TELEPHONY_SOURCE,
    });

    console.log('[telephony] Call event recorded', {
      eventId: event.id,
      eventType,
      callId: call.call_id,
      linked: ohid !== null,
    });
    return { eventId: event.id, eventType, ohid };
  }
}
