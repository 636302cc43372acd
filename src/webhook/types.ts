/**
 * Webhook Type Definitions
 *
 * Contract between the webhook receiver, the BullMQ sync queue and the
 * sync worker, plus the provider payload schemas the routes validate.
 */

import { z } from 'zod';
import type { SyncDirection, SyncResult } from '../sync/types.js';

/** Telephony provider call event */
export const cloudTalkEventSchema = z
  .object({
    event_type: z.string().min(1),
    call_id: z.union([z.string().min(1), z.number()]).transform(String),
    direction: z.string().default('inbound'),
    from_number: z.string().optional(),
    to_number: z.string().optional(),
    recording_url: z.string().nullish(),
    duration: z.number().nonnegative().optional(),
  })
  .passthrough();

export type CloudTalkEvent = z.infer<typeof cloudTalkEventSchema>;

/** Note-taking provider event; only the envelope is interpreted */
export const notionEventSchema = z
  .object({
    id: z.string().optional(),
    type: z.string().optional(),
  })
  .passthrough();

export type NotionEvent = z.infer<typeof notionEventSchema>;

/** Data stored in a BullMQ sync job */
export interface SyncJobData {
  ohid: string;
  direction: SyncDirection;
  /** Source and lead id that triggered the sync, for log correlation */
  sourceSystem: string;
  sourceLeadId: string;
  receivedAt: string; // ISO timestamp of ingestion
}

/** Result returned by the worker after processing a job */
export type SyncJobResult = SyncResult;
