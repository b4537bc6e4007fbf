/**
 * Tool routes: the registry catalog, with parameter schemas per tool.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';

export function toolRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { toolRegistry } = deps;

  // ─── GET /tools ─────────────────────────────────────────────────

  fastify.get('/tools', async (_request: FastifyRequest, reply: FastifyReply) => {
    await sendSuccess(reply, { version: toolRegistry.version, tools: toolRegistry.describe() });
  });

  // ─── GET /tools/:name ───────────────────────────────────────────
  // Single tool with the parameter schema agents see

  fastify.get(
    '/tools/:name',
    async (request: FastifyRequest<{ Params: { name: string } }>, reply: FastifyReply) => {
      const { name } = request.params;
      const entry = toolRegistry.describe().find((t) => t.name === name);
      const [definition] = toolRegistry.formatForProvider([name]);
      if (!entry || !definition) return sendNotFound(reply, 'Tool', name);
      await sendSuccess(reply, { ...entry, inputSchema: definition.inputSchema });
    },
  );
}
