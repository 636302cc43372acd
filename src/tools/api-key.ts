/**
 * Bearer API key check for the operation endpoints.
 *
 * Missing or malformed Authorization header → 401; wrong key → 403.
 * With no key configured the check is disabled (development only;
 * validateConfig refuses to start production without one).
 */

import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireApiKey(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const header = req.get('authorization') ?? '';
    if (!header.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing or invalid Authorization header. Use: Bearer <API_KEY>' });
      return;
    }

    if (!sameKey(header.slice('Bearer '.length), apiKey)) {
      console.warn('[auth] Rejected tools call with invalid API key', { path: req.path });
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
