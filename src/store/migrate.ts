/**
 * Apply schema.sql to DATABASE_URL.
 *
 * Usage: npm run migrate
 * The schema is idempotent (CREATE ... IF NOT EXISTS), so re-running is safe.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { appConfig } from '../config.js';
import { describeError } from '../errors.js';
import { PostgresRepository } from './postgres.js';

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

async function main() {
  const { url, ssl, maxConnections, retry } = appConfig.database;
  if (!url) {
    throw new Error('DATABASE_URL is not set — nothing to migrate');
  }

  const sql = await readFile(SCHEMA_PATH, 'utf8');
  const repo = new PostgresRepository({ connectionString: url, ssl, maxConnections, retry });
  try {
    await repo.applySchema(sql);
    console.log('[migrate] Schema applied');
  } finally {
    await repo.close();
  }
}

main().catch((err) => {
  console.error('[migrate] Failed:', describeError(err));
  process.exit(1);
});
