import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IdentityResolver } from '../../identity/resolver.js';
import { EventLog, EVENT_TYPES, stableEventId } from '../../store/event-log.js';
import { InMemoryRepository } from '../../store/memory.js';
import { cloudTalkEventSchema } from '../../webhook/types.js';
import { recordNotionEvent } from '../notion.js';
import { TelephonyEvents, TELEPHONY_SOURCE } from '../telephony.js';

function setup() {
  const repo = new InMemoryRepository();
  const events = new EventLog(repo);
  const resolver = new IdentityResolver(repo, events);
  return { repo, events, resolver, telephony: new TelephonyEvents(resolver, events) };
}

describe('TelephonyEvents', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('links an outbound call through the dialled number', async () => {
    const { repo, resolver, telephony } = setup();
    const { ohid } = await resolver.resolve({ phone: '+1 555 010 2000' }, 'TWILIO');

    const result = await telephony.record(
      cloudTalkEventSchema.parse({
        event_type: 'call.answered',
        call_id: 42,
        direction: 'outbound',
        from_number: '+15550000001',
        to_number: '+1 555 010 2000',
        duration: 61,
      }),
    );

    expect(result).toEqual({ eventId: stableEventId(TELEPHONY_SOURCE, '42', 'call.answered'), eventType: EVENT_TYPES.CALL_COMPLETED, ohid });
    const stored = repo.events.find((e) => e.id === result.eventId);
    expect(stored?.payload).toEqual({
      providerEventType: 'call.answered',
      call: {
        callId: '42',
        direction: 'OUTBOUND',
        from: '+15550000001',
        to: '+1 555 010 2000',
        recordingUrl: null,
        durationSeconds: 61,
      },
      ohid,
    });
  });

  it('records a call with no number unlinked', async () => {
    const { telephony } = setup();

    const result = await telephony.record(cloudTalkEventSchema.parse({ event_type: 'call.started', call_id: 'c-1' }));

    expect(result.eventType).toBe(EVENT_TYPES.CALL_RECEIVED);
    expect(result.ohid).toBeNull();
  });
});

describe('recordNotionEvent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  it('keeps a UUID event id as is', async () => {
    const { events } = setup();
    const id = '3b241101-e2bb-4255-8caf-4136c566a962';

    expect(await recordNotionEvent(events, { id, type: 'page.created' })).toEqual({ eventId: id });
  });

  it('derives a stable id from a non-UUID provider id', async () => {
    const { repo, events } = setup();

    const first = await recordNotionEvent(events, { id: 'evt_1', type: 'page.updated' });
    const second = await recordNotionEvent(events, { id: 'evt_1', type: 'page.updated' });

    expect(first.eventId).toBe(stableEventId('NOTION', 'evt_1'));
    expect(second).toEqual(first);
    expect(repo.events).toHaveLength(1);
  });

  it('falls back to a generic subtype', async () => {
    const { repo, events } = setup();

    const { eventId } = await recordNotionEvent(events, {});

    expect(repo.events.find((e) => e.id === eventId)?.payload).toEqual({ eventSubtype: 'notion.event', payload: {} });
  });
});
