/**
 * Application Entry Point
 *
 * Starts the Express HTTP server and the sync worker in a single process.
 *
 * Startup:
 * 1. Validate configuration (throws listing every missing variable)
 * 2. Build the engine: repository, event log, resolver, token manager,
 *    CRM client, reconciler, ingest services, operation registry
 * 3. Start Express server on configured port
 * 4. Start the BullMQ sync worker
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the worker (finish current jobs, stop accepting new)
 * 3. Close the queue, credential store and repository connections
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { RedisCredentialStore } from './auth/credential-store.js';
import { TokenManager } from './auth/token-manager.js';
import { appConfig, validateConfig } from './config.js';
import { CrmClient } from './crm/client.js';
import { crmConfig, validateCrmConfig } from './crm/config.js';
import { describeError } from './errors.js';
import { IdentityResolver } from './identity/resolver.js';
import { LeadIngestService } from './ingest/lead-ingest.js';
import { WebhookEventPublisher } from './ingest/publisher.js';
import { TelephonyEvents } from './ingest/telephony.js';
import { EventLog } from './store/event-log.js';
import { InMemoryRepository } from './store/memory.js';
import { PostgresRepository } from './store/postgres.js';
import type { Repository } from './store/types.js';
import { SyncReconciler } from './sync/reconciler.js';
import { buildOperations, REQUIRED_OPERATIONS } from './tools/operations.js';
import { OperationRegistry } from './tools/registry.js';
import { closeQueue, createRedisConnection, enqueueSync } from './webhook/queue.js';
import { createApp } from './webhook/server.js';
import { buildWebhookSources, SignatureVerifier } from './webhook/signature.js';
import { closeWorker, createWorker } from './webhook/worker.js';

function createRepository(): { repo: Repository; mode: 'postgres' | 'memory' } {
  const { url, ssl, maxConnections, retry } = appConfig.database;
  if (url) {
    return { repo: new PostgresRepository({ connectionString: url, ssl, maxConnections, retry }), mode: 'postgres' };
  }
  console.warn('[startup] DATABASE_URL not set — using in-memory store (data is lost on restart)');
  return { repo: new InMemoryRepository(), mode: 'memory' };
}

async function main() {
  console.log('[startup] Lead identity sync starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');

  validateConfig();
  validateCrmConfig();

  const { repo, mode } = createRepository();
  const publisher = appConfig.workflowWebhookUrl ? new WebhookEventPublisher(appConfig.workflowWebhookUrl) : null;
  const events = new EventLog(repo, publisher);
  const resolver = new IdentityResolver(repo, events);

  const credentialStore = new RedisCredentialStore(createRedisConnection());
  const tokens = new TokenManager({
    tokenUrl: crmConfig.oauth.tokenUrl,
    clientId: crmConfig.oauth.clientId,
    clientSecret: crmConfig.oauth.clientSecret,
    initialRefreshToken: crmConfig.oauth.refreshToken,
    credentialStore,
    staticAccessToken: crmConfig.oauth.staticAccessToken || undefined,
    safetyMarginMs: crmConfig.oauth.safetyMarginMs,
    timeoutMs: crmConfig.timeoutMs,
    retry: crmConfig.retry,
  });
  const crm = new CrmClient(tokens, {
    apiBase: crmConfig.apiBase,
    module: crmConfig.module,
    authScheme: crmConfig.authScheme,
    timeoutMs: crmConfig.timeoutMs,
    retry: crmConfig.retry,
  });
  const reconciler = new SyncReconciler(repo, events, crm, {
    remoteSystem: crmConfig.remoteSystem,
    attributionField: crmConfig.attributionField,
    defaultSource: appConfig.sync.defaultSource,
    lastNamePlaceholder: crmConfig.lastNamePlaceholder,
  });

  const ingest = new LeadIngestService(repo, resolver, events, {
    scheduleSync: appConfig.sync.onIngest ? enqueueSync : null,
    syncDirection: appConfig.sync.direction,
  });
  const telephony = new TelephonyEvents(resolver, events);
  const verifier = new SignatureVerifier(buildWebhookSources(appConfig.webhooks));

  const registry = new OperationRegistry(
    buildOperations({ resolver, events, verifier, tokens, reconciler, ingest, crm }),
    REQUIRED_OPERATIONS,
  );

  // Start Express server
  const app = createApp({
    verifier,
    ingest,
    telephony,
    events,
    registry,
    health: { storageMode: mode, tokenState: () => tokens.state() },
  });
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`, { storage: mode });
  });

  // Start BullMQ worker
  createWorker(reconciler);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);

    // Stop accepting new connections
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeWorker();
    console.log('[shutdown] Sync worker closed');

    await closeQueue();
    await credentialStore.close();
    await repo.close();
    console.log('[shutdown] Queue, Redis and store connections closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[shutdown] Error during shutdown:', describeError(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err) => {
  console.error('[startup] Fatal error:', describeError(err));
  process.exit(1);
});
