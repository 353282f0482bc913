// HTTP server assembly
// Everything stateful comes in as a dependency so tests can build the same server in process

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './env.js';
import { loggerOptions } from './logger.js';
import { chatRoutes } from './routes/chat.js';
import { functionCallRoutes } from './routes/function-calls.js';
import { functionRoutes } from './routes/functions.js';
import type { CallLogger } from './services/call-log/index.js';
import type { ConversationStore } from './services/conversations.js';
import type { FunctionRegistry } from './services/functions/index.js';
import type { Orchestrator } from './services/orchestrator/index.js';
import { handleRouteError } from './utils/errors.js';

export const API_VERSION = '1.0.0';

export interface ServerDependencies {
  orchestrator: Orchestrator;
  registry: FunctionRegistry;
  callLogger: CallLogger;
  conversations: ConversationStore;
}

export interface ServerOptions {
  logger?: boolean;
  corsOrigins?: string[];
  requestTimeoutMs?: number;
}

export async function buildServer(deps: ServerDependencies, options: ServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger === false ? false : loggerOptions(),
  });

  await server.register(cors, {
    origin: options.corsOrigins ?? env.CORS_ORIGINS,
  });

  server.setErrorHandler(handleRouteError);

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: API_VERSION,
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(chatRoutes, {
    prefix: '/v1',
    orchestrator: deps.orchestrator,
    conversations: deps.conversations,
    requestTimeoutMs: options.requestTimeoutMs,
  });
  await server.register(functionRoutes, { prefix: '/v1', registry: deps.registry });
  await server.register(functionCallRoutes, { prefix: '/v1', callLogger: deps.callLogger });

  return server;
}
