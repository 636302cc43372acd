/**
 * BullMQ Worker — Sync Job Processor
 *
 * Ingestion enqueues one job per new lead; this worker reconciles the
 * identity the lead resolved to with its CRM record.
 *
 * Design:
 * - processSyncJob is extracted as a named function for testability
 * - Worker uses lazy singleton pattern (same as queue.ts)
 * - Bounded concurrency; reconciliations of different identities run in parallel
 * - Kill switch checked at worker level (belt-and-suspenders with webhook layer)
 * - Only metadata is logged — never contact values
 *
 * Failure handling:
 * - Transient failures propagate so BullMQ retries with exponential backoff
 * - A rejected refresh credential is unrecoverable: retrying cannot help
 *   until an operator supplies a new one, so the job fails immediately
 * - Failed jobs are preserved for manual review (dead-letter pattern)
 */

import { Worker, UnrecoverableError } from 'bullmq';
import type { Job } from 'bullmq';
import { appConfig } from '../config.js';
import { CredentialExpiredError } from '../errors.js';
import type { SyncReconciler } from '../sync/reconciler.js';
import { createRedisConnection, QUEUE_NAME } from './queue.js';
import type { SyncJobData, SyncJobResult } from './types.js';

export type Reconcile = Pick<SyncReconciler, 'reconcile'>;

let _worker: Worker<SyncJobData, SyncJobResult> | null = null;

/**
 * Process a single sync job.
 *
 * @throws UnrecoverableError when the CRM credential is expired (no BullMQ retry)
 * @throws the reconciler's error otherwise (BullMQ handles retry)
 */
export async function processSyncJob(job: Job<SyncJobData>, reconciler: Reconcile): Promise<SyncJobResult> {
  const { ohid, direction, sourceSystem } = job.data;
  console.log(`[worker] Processing job ${job.id}`, { ohid, sourceSystem, attempt: job.attemptsMade + 1 });

  if (appConfig.killSwitch) {
    throw new Error('Automation disabled by kill switch');
  }

  try {
    return await reconciler.reconcile(ohid, direction);
  } catch (err) {
    if (err instanceof CredentialExpiredError) {
      throw new UnrecoverableError(err.message);
    }
    throw err;
  }
}

/**
 * Create and start the BullMQ worker (lazy singleton).
 */
export function createWorker(reconciler: Reconcile, concurrency = appConfig.sync.workerConcurrency): Worker<SyncJobData, SyncJobResult> {
  if (_worker) return _worker;

  _worker = new Worker<SyncJobData, SyncJobResult>(QUEUE_NAME, (job) => processSyncJob(job, reconciler), {
    connection: createRedisConnection(),
    concurrency,
  });

  _worker.on('completed', (job, result) => {
    console.log(`[worker] Job ${job.id} completed`, {
      ohid: job.data.ohid,
      status: result.status,
    });
  });

  _worker.on('failed', (job, err) => {
    console.error(`[worker] Job ${job?.id} failed`, {
      ohid: job?.data.ohid,
      error: err.message,
      attempt: job?.attemptsMade,
      maxAttempts: job?.opts.attempts,
    });
    if (job && job.attemptsMade >= (job.opts.attempts ?? 1)) {
      console.error(`[worker] Job ${job.id} exhausted all retries — now in dead-letter`, {
        ohid: job.data.ohid,
      });
    }
  });

  console.log('[worker] Started, listening for jobs on queue:', QUEUE_NAME);
  return _worker;
}

/**
 * Close the worker for graceful shutdown.
 *
 * Finishes current job processing, then stops accepting new jobs.
 */
export async function closeWorker(): Promise<void> {
  if (_worker) {
    await _worker.close();
    _worker = null;
  }
}
