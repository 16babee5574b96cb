// =============================================================================
// Calmpoint API — Entry point
// =============================================================================

import {
  closeDb,
  createSql,
  PgChatArchiveStore,
  PgCrisisResourceCache,
  PgMoodLogStore,
} from '@calmpoint/db';
import { buildApp } from './app.js';
import { config } from './config.js';
import { initSentry } from './sentry.js';
import { LlmClient } from './services/llmClient.js';

initSentry();

const sql = createSql(config.databaseUrl, { max: config.dbPoolMax });

const app = await buildApp({
  moodLogs: new PgMoodLogStore(sql),
  chatArchive: new PgChatArchiveStore(sql),
  crisisCache: new PgCrisisResourceCache(sql),
  generator: new LlmClient(config),
  checkDb: () => sql`SELECT 1`,
});

const shutdown = async (signal: string): Promise<void> => {
  app.log.info(`Received ${signal}. Shutting down gracefully…`);
  await app.close();
  await closeDb(sql);
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
