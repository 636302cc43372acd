/**
 * Express Webhook Server
 *
 * HTTP layer for inbound provider webhooks and the operation endpoints:
 * - POST /webhooks/cloudtalk — telephony call events (HMAC)
 * - POST /webhooks/notion — note-taking events (challenge, then HMAC)
 * - POST /webhooks/forms — form leads → full ingest (HMAC)
 * - GET /tools, POST /tools/:name — operation registry (bearer API key)
 * - GET /health — Server status, kill switch, storage and token state
 *
 * Each webhook:
 * 1. Checks kill switch (returns 503 so the provider retries later)
 * 2. Verifies the signature over the raw body (401, nothing processed)
 * 3. Parses and validates the payload (400 on malformed JSON or shape)
 * 4. Hands off to the ingest layer
 *
 * No PII is logged — payloads are sanitized before any console output.
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import type { z } from 'zod';
import { appConfig } from '../config.js';
import { AuthenticationFailureError, CredentialExpiredError } from '../errors.js';
import type { LeadIngestService } from '../ingest/lead-ingest.js';
import { recordNotionEvent } from '../ingest/notion.js';
import type { TelephonyEvents } from '../ingest/telephony.js';
import { leadIngestSchema } from '../ingest/types.js';
import type { EventLog } from '../store/event-log.js';
import { requireApiKey } from '../tools/api-key.js';
import { correlationMiddleware } from '../tools/middleware.js';
import { UnknownOperationError } from '../tools/registry.js';
import type { OperationRegistry } from '../tools/registry.js';
import { createHealthHandler } from './health.js';
import type { HealthInfo } from './health.js';
import { sanitizeForLog } from './sanitize.js';
import type { SignatureVerifier } from './signature.js';
import { cloudTalkEventSchema, notionEventSchema } from './types.js';

export interface AppDeps {
  verifier: SignatureVerifier;
  ingest: Pick<LeadIngestService, 'ingest'>;
  telephony: Pick<TelephonyEvents, 'record'>;
  events: EventLog;
  registry: OperationRegistry;
  health: HealthInfo;
}

// Express 4 does not forward rejected promises to the error handler
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function rawBodyOf(req: Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

function issuesOf(err: ZodError): string[] {
  return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp(deps: AppDeps) {
  const app = express();
  app.use(correlationMiddleware);

  const rawBody = express.raw({ type: () => true, limit: '1mb' });

  /**
   * Shared front half of every webhook route: kill switch, signature,
   * JSON parse, schema. Sends the error response itself and returns null
   * when the request must not be processed.
   */
  function accept<T extends z.ZodTypeAny>(
    source: string,
    schema: T,
    req: Request,
    res: Response,
  ): { payload: z.output<T> } | { challenge: string } | null {
    if (appConfig.killSwitch) {
      console.log('[webhook] Kill switch active — rejecting webhook', { source });
      res.status(503).json({ message: 'Automation disabled' });
      return null;
    }

    const body = rawBodyOf(req);
    let challenge: string | undefined;
    try {
      ({ challenge } = deps.verifier.assertValid(source, req.headers, body));
    } catch (err) {
      if (!(err instanceof AuthenticationFailureError)) throw err;
      console.warn('[webhook] Signature rejected', { source, error: err.message });
      res.status(401).json({ error: 'Invalid signature' });
      return null;
    }
    if (challenge !== undefined) {
      return { challenge };
    }

    let json: unknown;
    try {
      json = JSON.parse(body.toString('utf8'));
    } catch {
      res.status(400).json({ error: 'Malformed JSON' });
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      console.warn('[webhook] Invalid payload', { source, payload: sanitizeForLog(json) });
      res.status(400).json({ error: 'Invalid payload', issues: issuesOf(parsed.error) });
      return null;
    }
    return { payload: parsed.data };
  }

  // Health check
  app.get('/health', createHealthHandler(deps.health));

  // Telephony call events
  app.post('/webhooks/cloudtalk', rawBody, asyncRoute(async (req, res) => {
    const accepted = accept('cloudtalk', cloudTalkEventSchema, req, res);
    if (!accepted || !('payload' in accepted)) {
      if (accepted) res.status(400).json({ error: 'Unexpected challenge' });
      return;
    }
    const result = await deps.telephony.record(accepted.payload);
    res.status(200).json({ accepted: true, eventId: result.eventId, eventType: result.eventType });
  }));

  // Note-taking events; the subscription handshake echoes its challenge
  app.post('/webhooks/notion', rawBody, asyncRoute(async (req, res) => {
    const accepted = accept('notion', notionEventSchema, req, res);
    if (!accepted) return;
    if ('challenge' in accepted) {
      console.log('[webhook] Notion verification challenge answered');
      res.status(200).json({ challenge: accepted.challenge });
      return;
    }
    const result = await recordNotionEvent(deps.events, accepted.payload);
    res.status(200).json({ accepted: true, eventId: result.eventId });
  }));

  // Form leads → resolve, persist, schedule sync
  app.post('/webhooks/forms', rawBody, asyncRoute(async (req, res) => {
    const accepted = accept('forms', leadIngestSchema, req, res);
    if (!accepted || !('payload' in accepted)) {
      if (accepted) res.status(400).json({ error: 'Unexpected challenge' });
      return;
    }
    const result = await deps.ingest.ingest(accepted.payload);
    res.status(202).json({
      accepted: true,
      ohid: result.ohid,
      ingestId: result.ingestId,
      status: result.status,
    });
  }));

  // Operation registry
  const tools = express.Router();
  tools.use(requireApiKey(appConfig.tools.apiKey));
  tools.use(express.json({ limit: '1mb' }));

  tools.get('/', (_req, res) => {
    res.json({ operations: deps.registry.list() });
  });

  tools.post('/:name', asyncRoute(async (req, res) => {
    try {
      const result = await deps.registry.call(req.params.name, req.body ?? {});
      res.status(200).json({ result });
    } catch (err) {
      if (err instanceof UnknownOperationError) {
        res.status(404).json({ error: err.message });
      } else if (err instanceof ZodError) {
        res.status(400).json({ error: 'Invalid request', issues: issuesOf(err) });
      } else if (err instanceof CredentialExpiredError) {
        res.status(503).json({ error: 'CRM credential expired — operator action required' });
      } else {
        throw err;
      }
    }
  }));

  app.use('/tools', tools);

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON' });
      return;
    }
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
