/**
 * BullMQ Queue Configuration
 *
 * Manages the lead sync queue with:
 * - Deduplication via BullMQ jobId (same source lead = same job)
 * - Exponential backoff retry (5 attempts: 5s, 10s, 20s, 40s, 80s)
 * - 24h job retention for dedup window
 * - Failed job preservation for manual review (dead-letter pattern)
 *
 * Uses lazy singleton pattern — queue is not created until first access.
 * This prevents Redis connections during module import (breaks tests).
 */

import { Queue } from 'bullmq';
import { appConfig } from '../config.js';
import type { SyncJobData } from './types.js';

export const QUEUE_NAME = 'lead-sync';
export const SYNC_JOB_NAME = 'reconcile-identity';

/** Redis connection config shape for BullMQ and ioredis */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
  maxRetriesPerRequest: null;
}

/**
 * Parse a Redis URL into a connection config object.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
function parseRedisUrl(url: string): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password || undefined,
    ...(parsed.protocol === 'rediss:' ? { tls: {} } : {}),
    maxRetriesPerRequest: null,
  };
}

/**
 * Create a Redis connection config.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest: null is required by BullMQ for blocking commands.
 */
export function createRedisConnection(): RedisConnectionConfig {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
    maxRetriesPerRequest: null,
  };
}

/** BullMQ custom ids may not contain ':' */
export function syncJobId(sourceSystem: string, sourceLeadId: string): string {
  return `sync-${sourceSystem}-${sourceLeadId}`.replace(/:/g, '_');
}

// Lazy singleton — don't connect at import time
let _queue: Queue<SyncJobData> | null = null;

/**
 * Get the singleton BullMQ queue instance.
 *
 * Creates the queue on first call with:
 * - 5 retry attempts with exponential backoff (5s base)
 * - 24h completed job retention (supports dedup window)
 * - Failed jobs preserved indefinitely (dead-letter for manual review)
 */
export function getSyncQueue(): Queue<SyncJobData> {
  if (!_queue) {
    _queue = new Queue<SyncJobData>(QUEUE_NAME, {
      connection: createRedisConnection(),
      defaultJobOptions: {
        attempts: 5,
        backoff: {
          type: 'exponential',
          delay: 5000, // 5s, 10s, 20s, 40s, 80s
        },
        removeOnComplete: { age: 86400 }, // Keep 24h for dedup window
        removeOnFail: false, // Dead-letter: keep failed jobs for manual review
      },
    });
  }
  return _queue;
}

/**
 * Enqueue a reconciliation for the identity a lead resolved to.
 * A redelivered lead maps to the same jobId and is dropped by BullMQ.
 */
export async function enqueueSync(data: SyncJobData): Promise<string> {
  const jobId = syncJobId(data.sourceSystem, data.sourceLeadId);
  await getSyncQueue().add(SYNC_JOB_NAME, data, { jobId });
  console.log('[queue] Enqueued sync', { ohid: data.ohid, jobId });
  return jobId;
}

/**
 * Close the queue connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeQueue(): Promise<void> {
  if (_queue) {
    await _queue.close();
    _queue = null;
  }
}
