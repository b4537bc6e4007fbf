/**
 * Team routes: the configured teams and their members.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Team } from '@/teams/types.js';
import type { RouteDependencies } from '../types.js';
import { sendNotFound, sendSuccess } from '../error-handler.js';

function describeTeam(team: Team) {
  return {
    name: team.name,
    description: team.description ?? null,
    members: team.agents.map((a) => ({
      name: a.name,
      description: a.description ?? null,
      allowedTools: a.allowedTools,
      model: `${a.llm.provider}:${a.llm.model}`,
    })),
    routing: team.routing,
    maxTurns: team.maxTurns,
    afterToolResult: team.afterToolResult,
  };
}

export function teamRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { teams } = deps;

  fastify.get('/teams', async (_request: FastifyRequest, reply: FastifyReply) => {
    await sendSuccess(reply, teams.list().map(describeTeam));
  });

  fastify.get(
    '/teams/:name',
    async (request: FastifyRequest<{ Params: { name: string } }>, reply: FastifyReply) => {
      const team = teams.get(request.params.name);
      if (!team.ok) return sendNotFound(reply, 'Team', request.params.name);
      await sendSuccess(reply, describeTeam(team.value));
    },
  );
}
