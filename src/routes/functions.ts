// Function catalog route
import type { FastifyInstance } from 'fastify';
import type { FunctionRegistry } from '../services/functions/index.js';

export interface FunctionRouteOptions {
  registry: FunctionRegistry;
}

export async function functionRoutes(server: FastifyInstance, options: FunctionRouteOptions) {
  // GET /v1/functions - Schemas advertised to the model
  server.get('/functions', async () => {
    return { functions: options.registry.toFunctionSchemas() };
  });
}
