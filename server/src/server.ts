import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './api';
import { createDatabase, ensureTables, testDatabaseConnection } from './lib/db';
import { createDependencies } from './lib/dependencies';
import {
  getDatabaseUrl,
  getIngestionProgressPollMs,
  getKnowledgeBasesDir,
  getPort,
  getRagHealthTimeoutMs,
  getRagParseTimeoutMs,
  getRagQueryTimeoutMs,
  getRagServiceUrl,
  getUploadAllowedExtensions,
  getUploadsDir,
} from './lib/env';
import { toErrorMessage } from './lib/errors';
import { DrizzleFileRecordRepository } from './lib/files/drizzle-repository';
import { DrizzleKnowledgeBaseRepository } from './lib/knowledge-bases/drizzle-repository';
import { createRagServiceClient } from './lib/rag-client';

async function main() {
  const rag = createRagServiceClient({
    baseUrl: getRagServiceUrl(),
    healthTimeoutMs: getRagHealthTimeoutMs(),
    queryTimeoutMs: getRagQueryTimeoutMs(),
    parseTimeoutMs: getRagParseTimeoutMs(),
  });

  const databaseUrl = getDatabaseUrl();
  const database = databaseUrl ? createDatabase({ url: databaseUrl }) : null;

  if (database) {
    if (!(await testDatabaseConnection(database.db))) {
      throw new Error('Database connection is not healthy');
    }
    await ensureTables(database.db);
    console.log('[startup] using PostgreSQL storage');
  } else {
    console.log('[startup] DATABASE_URL not set, keeping records in memory');
  }

  const deps = createDependencies({
    rag,
    uploadsDir: getUploadsDir(),
    knowledgeBasesDir: getKnowledgeBasesDir(),
    progressPollMs: getIngestionProgressPollMs(),
    allowedExtensions: getUploadAllowedExtensions(),
    files: database ? new DrizzleFileRecordRepository(database.db) : undefined,
    knowledgeBaseRepository: database ? new DrizzleKnowledgeBaseRepository(database.db) : undefined,
  });

  await deps.knowledgeBases.syncFromDisk();
  await deps.tracker.recoverInterrupted();

  const ragHealth = await rag.health();
  if (ragHealth.healthy) {
    console.log(`[startup] retrieval service reachable at ${rag.baseUrl}`);
  } else {
    console.warn(`[startup] retrieval service not reachable at ${rag.baseUrl}: ${JSON.stringify(ragHealth.info)}`);
  }

  const port = getPort();
  const server = serve({ fetch: createApp(deps).fetch, port }, (info) => {
    console.log(`[startup] listening on http://localhost:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[startup] ${signal} received, stopping`);

    server.close();
    await deps.tracker.shutdown();
    if (database) {
      await database.close();
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error(`[startup] shutdown failed: ${toErrorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('[startup] failed to start server:', error);
  process.exit(1);
});
