// Function-calling chat API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { createDatabase, ensureCallLogSchema } from './db.js';
import type { DatabaseConnection } from './db.js';
import { describeConfiguration, env } from './env.js';
import { logger } from './logger.js';
import { createModelGateway } from './providers/index.js';
import { buildServer } from './server.js';
import { CallLogger, InMemoryCallLogStore, PostgresCallLogStore } from './services/call-log/index.js';
import type { CallLogStore } from './services/call-log/index.js';
import { ConversationStore } from './services/conversations.js';
import { initializeFunctions } from './services/functions/index.js';
import { Orchestrator } from './services/orchestrator/index.js';

const database: DatabaseConnection | null = env.DATABASE_URL ? createDatabase(env.DATABASE_URL) : null;
const registry = initializeFunctions();
const conversations = new ConversationStore(env.CONVERSATION_TTL_MS);

async function openCallLogStore(): Promise<CallLogStore> {
  if (!database) {
    logger.warn('DATABASE_URL not set; function calls are logged in memory only');
    return new InMemoryCallLogStore();
  }
  await ensureCallLogSchema(database.db);
  return new PostgresCallLogStore(database.db);
}

async function start(): Promise<void> {
  const callLogger = new CallLogger(await openCallLogStore(), env.CALL_LOG_POLICY);
  const orchestrator = new Orchestrator(
    { gateway: createModelGateway(env.MODEL_PROVIDER), registry, callLogger },
    { maxRounds: env.MAX_FUNCTION_ROUNDS, modelTimeoutMs: env.MODEL_TIMEOUT_MS },
  );
  const server = await buildServer({ orchestrator, registry, callLogger, conversations });

  server.addHook('onClose', async () => {
    conversations.close();
    await database?.close();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      server.log.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await server.listen({ port: env.PORT, host: env.HOST });
  server.log.info(describeConfiguration(), `Function-calling chat API listening on http://${env.HOST}:${env.PORT}`);
}

// Start server
try {
  await start();
} catch (err) {
  logger.fatal({ err }, 'Failed to start');
  conversations.close();
  await database?.close().catch((closeErr: unknown) => logger.error({ err: closeErr }, 'Database close failed'));
  process.exit(1);
}
