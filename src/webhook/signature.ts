/**
 * Webhook Signature Verification
 *
 * Each inbound source declares how its calls are authenticated:
 * - hmac-sha256: hex HMAC-SHA256 of the raw body under a shared secret,
 *   carried in a header (optionally behind a prefix such as "sha256=")
 * - challenge: a subscription handshake body ({ challenge } or
 *   { verification_token }) is accepted and echoed; every other call is
 *   checked as hmac-sha256
 *
 * verify() never throws. Unknown sources, missing headers and unset secrets
 * are all invalid (fail closed).
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { AuthenticationFailureError } from '../errors.js';

export type SignatureScheme = 'hmac-sha256' | 'challenge';

export interface SourceVerification {
  scheme: SignatureScheme;
  /** Header carrying the signature; matched case-insensitively */
  header: string;
  secret?: string;
  /** Stripped from the header value before comparison */
  prefix?: string;
}

export type VerificationResult =
  | { valid: true; challenge?: string }
  | { valid: false; reason: string };

export type HeaderBag = Record<string, string | string[] | undefined>;

export function computeSignature(secret: string, rawBody: Buffer | string): string {
  return createHmac('sha256', secret).update(rawBody).digest('hex');
}

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

function extractChallenge(rawBody: Buffer | string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString());
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  for (const key of ['challenge', 'verification_token']) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

export class SignatureVerifier {
  constructor(private readonly sources: Readonly<Record<string, SourceVerification>>) {}

  verify(source: string, headers: HeaderBag, rawBody: Buffer | string): VerificationResult {
    const config = Object.hasOwn(this.sources, source) ? this.sources[source] : undefined;
    if (!config) {
      return { valid: false, reason: 'unknown source' };
    }

    if (config.scheme === 'challenge') {
      const challenge = extractChallenge(rawBody);
      if (challenge !== undefined) {
        return { valid: true, challenge };
      }
    }

    if (!config.secret) {
      return { valid: false, reason: 'secret not configured' };
    }

    let provided = headerValue(headers, config.header);
    if (!provided) {
      return { valid: false, reason: 'signature header missing' };
    }
    if (config.prefix) {
      if (!provided.startsWith(config.prefix)) {
        return { valid: false, reason: 'signature prefix missing' };
      }
      provided = provided.slice(config.prefix.length);
    }

    const expected = Buffer.from(computeSignature(config.secret, rawBody), 'utf8');
    const actual = Buffer.from(provided, 'utf8');
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      return { valid: false, reason: 'signature mismatch' };
    }
    return { valid: true };
  }

  /**
   * Same checks as verify(), throwing on rejection.
   * @returns the handshake challenge to echo, if the body was one
   * @throws AuthenticationFailureError
   */
  assertValid(source: string, headers: HeaderBag, rawBody: Buffer | string): { challenge?: string } {
    const result = this.verify(source, headers, rawBody);
    if (!result.valid) {
      throw new AuthenticationFailureError(source, result.reason);
    }
    return result.challenge !== undefined ? { challenge: result.challenge } : {};
  }
}

export interface WebhookSecrets {
  cloudtalkSecret: string | undefined;
  notionSecret: string | undefined;
  formsSecret: string | undefined;
}

/** Verification settings for the three inbound webhook sources */
export function buildWebhookSources(secrets: WebhookSecrets): Record<string, SourceVerification> {
  return {
    cloudtalk: { scheme: 'hmac-sha256', header: 'x-cloudtalk-signature', secret: secrets.cloudtalkSecret },
    notion: { scheme: 'challenge', header: 'x-notion-signature', prefix: 'sha256=', secret: secrets.notionSecret },
    forms: { scheme: 'hmac-sha256', header: 'x-webhook-signature', secret: secrets.formsSecret },
  };
}
