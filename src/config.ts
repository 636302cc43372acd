/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the HTTP server, the event
 * store, the sync queue and the inbound webhooks. CRM settings live in
 * src/crm/config.ts.
 *
 * Environment variables:
 * - APP_ENV: 'production' makes DATABASE_URL mandatory
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to reject all inbound processing
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - DATABASE_URL / DATABASE_SSL / DATABASE_POOL_MAX: Event store (in-memory when unset)
 * - CLOUDTALK_WEBHOOK_SECRET / NOTION_WEBHOOK_SECRET / FORMS_WEBHOOK_SECRET: HMAC secrets
 * - TOOLS_API_KEY: Bearer key for POST /tools/:name (open when unset, development only)
 * - WORKFLOW_WEBHOOK_URL: Downstream consumer for recorded workflow events
 * - SYNC_ON_INGEST / SYNC_DIRECTION / SYNC_WORKER_CONCURRENCY: Ingest-triggered sync
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';
import { SYNC_DIRECTIONS } from './sync/types.js';
import type { SyncDirection } from './sync/types.js';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
  };
  database: {
    url: string | undefined;
    ssl: boolean;
    maxConnections: number;
    retry: { attempts: number; baseDelayMs: number };
  };
  webhooks: {
    cloudtalkSecret: string | undefined;
    notionSecret: string | undefined;
    formsSecret: string | undefined;
  };
  tools: {
    apiKey: string | undefined;
  };
  workflowWebhookUrl: string | undefined;
  sync: {
    onIngest: boolean;
    direction: SyncDirection;
    workerConcurrency: number;
    /** Attribution written to the CRM for identities with no lead context */
    defaultSource: string;
  };
  server: {
    port: number;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function parseDirection(value: string): SyncDirection {
  const match = SYNC_DIRECTIONS.find((d) => d === value);
  if (!match) {
    throw new Error(`SYNC_DIRECTION must be one of ${SYNC_DIRECTIONS.join(', ')} (got "${value}")`);
  }
  return match;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  redis: {
    url: process.env.REDIS_URL ?? undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: parseInt(optionalEnv('REDIS_PORT', '6379'), 10),
    password: process.env.REDIS_PASSWORD ?? undefined,
  },
  database: {
    url: isDev ? process.env.DATABASE_URL || undefined : requiredEnv('DATABASE_URL'),
    ssl: process.env.DATABASE_SSL === 'true',
    maxConnections: parseInt(optionalEnv('DATABASE_POOL_MAX', '10'), 10),
    retry: {
      attempts: parseInt(optionalEnv('DATABASE_RETRY_ATTEMPTS', '3'), 10),
      baseDelayMs: parseInt(optionalEnv('DATABASE_RETRY_BASE_DELAY_MS', '200'), 10),
    },
  },
  webhooks: {
    cloudtalkSecret: process.env.CLOUDTALK_WEBHOOK_SECRET || undefined,
    notionSecret: process.env.NOTION_WEBHOOK_SECRET || undefined,
    formsSecret: process.env.FORMS_WEBHOOK_SECRET || undefined,
  },
  tools: {
    apiKey: process.env.TOOLS_API_KEY || undefined,
  },
  workflowWebhookUrl: process.env.WORKFLOW_WEBHOOK_URL || undefined,
  sync: {
    onIngest: optionalEnv('SYNC_ON_INGEST', 'true') === 'true',
    direction: parseDirection(optionalEnv('SYNC_DIRECTION', 'bidirectional')),
    workerConcurrency: parseInt(optionalEnv('SYNC_WORKER_CONCURRENCY', '5'), 10),
    defaultSource: optionalEnv('SYNC_DEFAULT_SOURCE', 'LEAD_SYNC'),
  },
  server: {
    port: parseInt(optionalEnv('PORT', '3000'), 10),
  },
};

/**
 * Startup checks that depend on more than one variable.
 * Throws with a list of every problem found.
 */
export function validateConfig(config: AppConfig = appConfig): void {
  const problems: string[] = [];

  if (!config.isDev && !config.tools.apiKey) {
    problems.push('TOOLS_API_KEY is required in production');
  }
  for (const [name, secret] of Object.entries(config.webhooks)) {
    if (!secret) {
      console.warn(`[config] Webhook secret "${name}" not set — that source will be rejected`);
    }
  }

  if (problems.length > 0) {
    throw new Error(`App config incomplete:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
}
