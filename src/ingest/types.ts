import { z } from 'zod';

export const SOURCE_SYSTEMS = ['META', 'WEB', 'TWILIO', 'ZOHO_SOCIAL', 'ZOHO_CRM'] as const;

export const CHANNELS = [
  'WEB_FORM',
  'META_LEAD_AD',
  'INBOUND_CALL',
  'OUTBOUND_CALL',
  'SOCIAL',
  'CRM',
] as const;

const isoTimestamp = z.string().datetime({ offset: true });

export const personSchema = z.object({
  firstName: z.string().trim().min(1),
  lastName: z.string().trim().min(1),
  email: z.string().trim().email().optional(),
  phone: z.string().trim().min(1).optional(),
});

export const leadIngestSchema = z.object({
  sourceSystem: z.enum(SOURCE_SYSTEMS),
  sourceLeadId: z.string().min(1).max(255),
  channel: z.enum(CHANNELS),
  person: personSchema,
  leadDetails: z
    .object({
      budgetRange: z.string().optional(),
      location: z.string().optional(),
      propertyType: z.string().optional(),
      freeText: z.string().optional(),
    })
    .optional(),
  consent: z.object({
    marketing: z.boolean(),
    source: z.string().optional(),
    timestamp: isoTimestamp.optional(),
  }),
  rawPayload: z.record(z.unknown()).default({}),
  timestamp: isoTimestamp.optional(),
  meta: z.record(z.unknown()).default({}),
});

export type LeadIngestRequest = z.infer<typeof leadIngestSchema>;

export interface IngestResult {
  ohid: string;
  ingestId: string;
  sourceSystem: string;
  status: 'ingested' | 'duplicate';
  /** true when the lead allocated a new identity */
  created: boolean;
  /** BullMQ job id of the follow-up sync, when one was scheduled */
  syncJobId: string | null;
}
