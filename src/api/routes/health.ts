import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

export function healthRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  fastify.get('/health', async (_request, reply) => {
    await sendSuccess(reply, {
      status: 'ok',
      timestamp: new Date().toISOString(),
      toolRegistryVersion: deps.toolRegistry.version,
    });
  });
}
