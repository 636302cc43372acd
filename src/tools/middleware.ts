/**
 * Correlation ids and audit logging for operation calls.
 *
 * Each HTTP request gets a correlation id (the inbound X-Correlation-Id, or a
 * fresh UUID) held in AsyncLocalStorage, so every audit line written while
 * serving that request carries it without threading it through call sites.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { describeError } from '../errors.js';

export const CORRELATION_HEADER = 'x-correlation-id';

const correlationStore = new AsyncLocalStorage<string>();

export function getCorrelationId(): string | undefined {
  return correlationStore.getStore();
}

export function runWithCorrelationId<T>(correlationId: string, fn: () => T): T {
  return correlationStore.run(correlationId, fn);
}

export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const inbound = req.get(CORRELATION_HEADER);
  const correlationId = inbound && inbound.length <= 128 ? inbound : randomUUID();
  res.setHeader(CORRELATION_HEADER, correlationId);
  runWithCorrelationId(correlationId, next);
}

export function auditLog(eventType: string, fields: Record<string, unknown> = {}): void {
  console.log(`[audit] ${eventType}`, { correlationId: getCorrelationId() ?? null, ...fields });
}

/** Wrap one operation call in tool.start / tool.end / tool.error audit lines */
export async function withAudit<T>(tool: string, fn: () => Promise<T>): Promise<T> {
  const started = performance.now();
  auditLog('tool.start', { tool });
  try {
    const result = await fn();
    auditLog('tool.end', { tool, durationMs: Math.round(performance.now() - started) });
    return result;
  } catch (err) {
    auditLog('tool.error', {
      tool,
      durationMs: Math.round(performance.now() - started),
      errorName: err instanceof Error ? err.name : 'Error',
      error: describeError(err),
    });
    throw err;
  }
}
