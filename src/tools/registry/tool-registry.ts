/**
 * ToolRegistry: static catalog of the tools available to every task.
 * Built once at startup from local tools and MCP-discovered tools, then
 * read-only. Adding a tool means building a new registry (restart).
 */
import { createHash } from 'node:crypto';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { ConclaveError, UnknownToolError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolDefinitionForProvider } from '@/providers/types.js';
import type { ToolCatalogEntry, ToolHandle } from '../types.js';

const logger = createLogger({ name: 'tool-registry' });

export interface ToolRegistry {
  /** Short hash of the registered tool set; changes whenever the catalog does. */
  readonly version: string;

  /** Resolve a tool by name. */
  resolve(toolName: string): Result<ToolHandle, UnknownToolError>;

  has(toolName: string): boolean;

  /** All registered tool names, sorted. */
  listAll(): string[];

  /** Public catalog for listing. */
  describe(): ToolCatalogEntry[];

  /**
   * Format the subset of tools named in `allowedTools` for an LLM provider.
   * Names that are not registered are skipped.
   */
  formatForProvider(allowedTools: Iterable<string>): ToolDefinitionForProvider[];
}

/**
 * Create a registry from a fixed list of tools.
 * @throws ConclaveError (DUPLICATE_TOOL) when two tools share a name.
 */
export function createToolRegistry(tools: readonly ToolHandle[]): ToolRegistry {
  const byName = new Map<string, ToolHandle>();

  for (const tool of tools) {
    const existing = byName.get(tool.name);
    if (existing) {
      throw new ConclaveError({
        message: `Tool "${tool.name}" is registered twice`,
        code: 'DUPLICATE_TOOL',
        context: { toolName: tool.name, providers: [existing.provider, tool.provider] },
        isOperational: false,
      });
    }
    byName.set(tool.name, tool);
  }

  const names = [...byName.keys()].sort();
  const version = createHash('sha256')
    .update(
      names
        .map((name) => {
          const provider = byName.get(name)?.provider;
          return `${name}@${provider?.kind === 'mcp' ? `mcp:${provider.serverName}` : 'local'}`;
        })
        .join('\n'),
    )
    .digest('hex')
    .slice(0, 12);

  // Schemas are derived once; the catalog never changes after construction
  const providerDefinitions = new Map<string, ToolDefinitionForProvider>();
  for (const tool of byName.values()) {
    providerDefinitions.set(tool.name, {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.jsonSchema ?? toOpenAICompatibleSchema(tool.inputSchema),
    });
  }

  logger.info('Tool registry built', {
    component: 'tool-registry',
    version,
    tools: names,
  });

  return Object.freeze({
    version,

    resolve(toolName: string): Result<ToolHandle, UnknownToolError> {
      const tool = byName.get(toolName);
      if (!tool) {
        logger.warn('Unknown tool requested', {
          component: 'tool-registry',
          tool: toolName,
        });
        return err(new UnknownToolError(toolName, names));
      }
      return ok(tool);
    },

    has(toolName: string): boolean {
      return byName.has(toolName);
    },

    listAll(): string[] {
      return [...names];
    },

    describe(): ToolCatalogEntry[] {
      return names.flatMap((name) => {
        const tool = byName.get(name);
        return tool ? [{ name, description: tool.description, provider: tool.provider }] : [];
      });
    },

    formatForProvider(allowedTools: Iterable<string>): ToolDefinitionForProvider[] {
      const result: ToolDefinitionForProvider[] = [];
      for (const name of new Set(allowedTools)) {
        const definition = providerDefinitions.get(name);
        if (definition) result.push(definition);
      }
      return result;
    },
  });
}

/**
 * Convert a Zod schema to a JSON Schema usable as function parameters.
 * Uses the `jsonSchema7` target: OpenAI rejects draft 4 style boolean
 * `exclusiveMinimum`, and rejects `$schema` in parameters.
 */
export function toOpenAICompatibleSchema(zodSchema: z.ZodType): Record<string, unknown> {
  const schema: Record<string, unknown> = Object.fromEntries(
    Object.entries(zodToJsonSchema(zodSchema, { target: 'jsonSchema7' })).filter(
      ([key]) => key !== '$schema',
    ),
  );
  if (schema['type'] === undefined) {
    schema['type'] = 'object';
  }
  return schema;
}
