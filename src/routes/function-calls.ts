// Function call log routes
// Read-only audit view over the call log

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { CallLogger } from '../services/call-log/index.js';
import { DEFAULT_LIST_LIMIT } from '../services/call-log/index.js';

export const MAX_LIST_LIMIT = 200;

const ListQuerySchema = z.object({
  correlation_id: z.string().trim().min(1).optional(),
  function_name: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIST_LIMIT).default(DEFAULT_LIST_LIMIT),
});

export interface FunctionCallRouteOptions {
  callLogger: CallLogger;
}

export async function functionCallRoutes(server: FastifyInstance, options: FunctionCallRouteOptions) {
  // GET /v1/function-calls - Newest records first
  server.get('/function-calls', async request => {
    const query = ListQuerySchema.parse(request.query);

    const records = await options.callLogger.list({
      correlationId: query.correlation_id,
      functionName: query.function_name,
      limit: query.limit,
    });

    return { records };
  });
}
