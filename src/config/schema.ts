/**
 * Zod schemas for the Conclave configuration file.
 * They mirror the domain types in core/types.ts, agents/types.ts and
 * teams/types.ts and add defaults for everything optional.
 */
import { z } from 'zod';

// ─── LLM Provider Config ────────────────────────────────────────

export const llmProviderConfigSchema = z.object({
  provider: z.enum(['openai', 'anthropic', 'groq', 'ollama']),
  model: z.string().min(1, 'Model identifier cannot be empty'),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
  apiKeyEnvVar: z.string().min(1).optional(),
  baseUrl: z.string().url('Invalid base URL format').optional(),
});

// ─── Agents ─────────────────────────────────────────────────────

export const agentDefinitionSchema = z.object({
  name: z
    .string()
    .min(1, 'Agent name cannot be empty')
    .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'Agent names must be single words (letters, digits, _ or -)'),
  description: z.string().optional(),
  instructions: z.string().min(1, 'Agent instructions cannot be empty'),
  allowedTools: z.array(z.string().min(1)).default([]),
  /** Per-agent override merged over the top-level llm section. */
  llm: llmProviderConfigSchema.partial().optional(),
});

// ─── Teams ──────────────────────────────────────────────────────

export const handoffRuleSchema = z.object({
  from: z.string().min(1).optional(),
  keywords: z.array(z.string().min(1)).min(1, 'A handoff rule needs at least one keyword'),
  to: z.string().min(1),
});

export const routingPolicySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('round-robin') }),
  z.object({ type: z.literal('coordinator-directed'), lead: z.string().min(1) }),
  z.object({
    type: z.literal('handoff'),
    rules: z.array(handoffRuleSchema).default([]),
    fallback: z.enum(['round-robin', 'same-speaker']).default('round-robin'),
  }),
]);

export const teamConfigSchema = z.object({
  name: z.string().min(1, 'Team name cannot be empty'),
  description: z.string().optional(),
  members: z.array(z.string().min(1)).min(1, 'A team needs at least one member'),
  routing: routingPolicySchema.default({ type: 'round-robin' }),
  maxTurns: z.number().int().positive('Max turns must be a positive integer').default(20),
  afterToolResult: z.enum(['same-speaker', 'next-speaker']).default('same-speaker'),
});

// ─── MCP Server Config ──────────────────────────────────────────

export const mcpServerConfigSchema = z
  .object({
    name: z.string().min(1, 'MCP server name cannot be empty'),
    description: z.string().optional(),
    transport: z.enum(['stdio', 'sse']),
    command: z.string().min(1).optional(),
    args: z.array(z.string()).optional(),
    /** Maps variable names seen by the server to variable names in our environment. */
    env: z.record(z.string(), z.string()).optional(),
    url: z.string().url('Invalid MCP server URL').optional(),
    /** Tool names this server serves; empty means every tool it lists. */
    capabilities: z.array(z.string().min(1)).default([]),
  })
  .refine((data) => data.transport !== 'stdio' || data.command !== undefined, {
    message: 'stdio transport requires a "command" field',
    path: ['command'],
  })
  .refine((data) => data.transport !== 'sse' || data.url !== undefined, {
    message: 'sse transport requires a "url" field',
    path: ['url'],
  });

// ─── Tools ──────────────────────────────────────────────────────

export const toolsConfigSchema = z.object({
  workspaceDir: z.string().min(1).default('./workspace'),
  timeoutMs: z.number().int().positive('Timeout must be a positive integer').default(30_000),
  maxRetries: z.number().int().min(0).max(10, 'Max retries cannot exceed 10').default(2),
  retryDelayMs: z.number().int().min(0).default(250),
  webSearch: z
    .object({ apiKeyEnvVar: z.string().min(1).default('TAVILY_API_KEY') })
    .default({}),
  github: z
    .object({
      tokenEnvVar: z.string().min(1).default('GITHUB_TOKEN'),
      baseUrl: z.string().url().default('https://api.github.com'),
    })
    .default({}),
});

// ─── Coordinator / Storage / Server ─────────────────────────────

export const coordinatorConfigSchema = z.object({
  completionToken: z.string().min(1).default('TASK_COMPLETE'),
  maxStepRetries: z.number().int().min(0).max(10).default(2),
  stepRetryDelayMs: z.number().int().min(0).default(1_000),
});

export const storageConfigSchema = z.object({
  dir: z.string().min(1).default('./data/conversations'),
});

export const serverConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(1).max(65_535).default(3000),
});

// ─── Config File ────────────────────────────────────────────────

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

export const conclaveConfigSchema = z
  .object({
    llm: llmProviderConfigSchema,
    agents: z.array(agentDefinitionSchema).min(1, 'At least one agent must be defined'),
    teams: z.array(teamConfigSchema).min(1, 'At least one team must be defined'),
    tools: toolsConfigSchema.default({}),
    mcpServers: z.array(mcpServerConfigSchema).default([]),
    coordinator: coordinatorConfigSchema.default({}),
    storage: storageConfigSchema.default({}),
    server: serverConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    for (const name of findDuplicates(config.agents.map((a) => a.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate agent "${name}"`, path: ['agents'] });
    }
    for (const name of findDuplicates(config.teams.map((t) => t.name))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate team "${name}"`, path: ['teams'] });
    }
    for (const name of findDuplicates(config.mcpServers.map((s) => s.name))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate MCP server "${name}"`,
        path: ['mcpServers'],
      });
    }

    const agentNames = new Set(config.agents.map((a) => a.name));
    config.teams.forEach((team, index) => {
      const members = new Set(team.members);
      for (const member of team.members) {
        if (!agentNames.has(member)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Team "${team.name}" references undefined agent "${member}"`,
            path: ['teams', index, 'members'],
          });
        }
      }
      if (members.size !== team.members.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Team "${team.name}" lists a member more than once`,
          path: ['teams', index, 'members'],
        });
      }

      const routing = team.routing;
      if (routing.type === 'coordinator-directed' && !members.has(routing.lead)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Lead "${routing.lead}" is not a member of team "${team.name}"`,
          path: ['teams', index, 'routing', 'lead'],
        });
      }
      if (routing.type === 'handoff') {
        routing.rules.forEach((rule, ruleIndex) => {
          for (const name of [rule.to, rule.from]) {
            if (name !== undefined && !members.has(name)) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Handoff rule names "${name}", who is not a member of team "${team.name}"`,
                path: ['teams', index, 'routing', 'rules', ruleIndex],
              });
            }
          }
        });
      }
    });
  });

export type ConclaveConfig = z.infer<typeof conclaveConfigSchema>;
/** Config as written in the file, before defaults are applied. */
export type ConclaveConfigInput = z.input<typeof conclaveConfigSchema>;
export type AgentDefinitionConfig = z.infer<typeof agentDefinitionSchema>;
export type TeamConfig = z.infer<typeof teamConfigSchema>;
export type MCPServerConfigEntry = z.infer<typeof mcpServerConfigSchema>;
export type ToolsConfig = z.infer<typeof toolsConfigSchema>;
