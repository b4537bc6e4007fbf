import { createHash } from 'node:crypto';
import type { AgentDefinitionConfig, ConclaveConfig, TeamConfig } from '@/config/schema.js';
import { NotFoundError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { LLMProviderConfig } from '@/core/types.js';
import type { AgentDefinition } from '@/agents/types.js';
import type { Team, TeamSnapshot } from './types.js';

export interface TeamCatalog {
  get(name: string): Result<Team, NotFoundError>;
  /** In config order. */
  list(): readonly Team[];
}

/** Merge an agent's partial backend override over the global one. */
export function resolveAgent(llm: LLMProviderConfig, config: AgentDefinitionConfig): AgentDefinition {
  return {
    name: config.name,
    ...(config.description !== undefined ? { description: config.description } : {}),
    instructions: config.instructions,
    allowedTools: [...config.allowedTools],
    llm: { ...llm, ...config.llm },
  };
}

function buildTeam(config: TeamConfig, agents: ReadonlyMap<string, AgentDefinition>): Team {
  const members = config.members.map((name) => {
    const agent = agents.get(name);
    // Config validation guarantees every member is defined
    if (!agent) throw new NotFoundError('Agent', name);
    return agent;
  });
  return {
    name: config.name,
    ...(config.description !== undefined ? { description: config.description } : {}),
    agents: members,
    routing: config.routing,
    maxTurns: config.maxTurns,
    afterToolResult: config.afterToolResult,
  };
}

/** Build every configured team once at startup. */
export function createTeamCatalog(config: Pick<ConclaveConfig, 'llm' | 'agents' | 'teams'>): TeamCatalog {
  const agents = new Map(config.agents.map((a) => [a.name, resolveAgent(config.llm, a)]));
  const teams = config.teams.map((t) => buildTeam(t, agents));
  const byName = new Map(teams.map((t) => [t.name, t]));

  return Object.freeze({
    get(name: string): Result<Team, NotFoundError> {
      const team = byName.get(name);
      return team ? ok(team) : err(new NotFoundError('Team', name));
    },
    list: () => teams,
  });
}

// ─── Snapshot ───────────────────────────────────────────────────

/**
 * Describe a team for a task header. The fingerprint changes whenever
 * anything that shapes the conversation changes.
 */
export function snapshotTeam(team: Team): TeamSnapshot {
  const canonical = JSON.stringify({
    name: team.name,
    agents: team.agents.map((a) => ({
      name: a.name,
      description: a.description ?? null,
      instructions: a.instructions,
      allowedTools: [...a.allowedTools].sort(),
      llm: {
        provider: a.llm.provider,
        model: a.llm.model,
        temperature: a.llm.temperature ?? null,
        maxOutputTokens: a.llm.maxOutputTokens ?? null,
        baseUrl: a.llm.baseUrl ?? null,
      },
    })),
    routing: team.routing,
    maxTurns: team.maxTurns,
    afterToolResult: team.afterToolResult,
  });

  return {
    name: team.name,
    fingerprint: createHash('sha256').update(canonical).digest('hex').slice(0, 16),
    members: team.agents.map((a) => a.name),
    routing: team.routing,
    maxTurns: team.maxTurns,
    afterToolResult: team.afterToolResult,
  };
}
