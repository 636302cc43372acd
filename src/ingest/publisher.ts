/**
 * Workflow Event Publisher
 *
 * Forwards each newly recorded workflow event to WORKFLOW_WEBHOOK_URL, where
 * the calendar, voice-agent and orchestration systems pick it up. Throws on
 * failure; EventLog logs the failure and keeps the stored event.
 */

import type { EventPublisher } from '../store/event-log.js';
import type { WorkflowEventRecord } from '../store/types.js';

export class WebhookEventPublisher implements EventPublisher {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async publish(event: WorkflowEventRecord): Promise<void> {
    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        eventId: event.id,
        eventType: event.eventType,
        ohid: event.ohid,
        sourceSystem: event.sourceSystem,
        occurredAt: event.occurredAt.toISOString(),
        payload: event.payload,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Workflow webhook returned ${response.status}`);
    }
  }
}
