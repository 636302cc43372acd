import { z } from 'zod';
import { EVENT_TYPES, stableEventId } from '../store/event-log.js';
import type { EventLog } from '../store/event-log.js';
import type { NotionEvent } from '../webhook/types.js';

export const NOTES_SOURCE = 'NOTION';

const uuid = z.string().uuid();

/** Persist a note-taking provider event as-is; it is not tied to an identity */
export async function recordNotionEvent(events: EventLog, payload: NotionEvent): Promise<{ eventId: string }> {
  let id: string | undefined;
  if (payload.id) {
    id = uuid.safeParse(payload.id).success ? payload.id : stableEventId(NOTES_SOURCE, payload.id);
  }

  const event = await events.record({
    id,
    ohid: null,
    eventType: EVENT_TYPES.NOTION_EVENT,
    payload: {
      eventSubtype: payload.type ?? 'notion.event',
      payload,
    },
    sourceSystem: NOTES_SOURCE,
  });

  console.log('[notion] Event recorded', { eventId: event.id, subtype: payload.type ?? null });
  return { eventId: event.id };
}
