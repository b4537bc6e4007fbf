/**
 * Wires the configured services together. Shared by the HTTP server and the CLI.
 */
import { createAgentRuntime } from '@/agents/agent-runtime.js';
import type { ConclaveConfig } from '@/config/schema.js';
import { createFileConversationStore } from '@/conversation/file-store.js';
import type { ConversationStore } from '@/conversation/types.js';
import type { LLMProviderConfig } from '@/core/types.js';
import { createMCPManager } from '@/mcp/mcp-manager.js';
import type { MCPManager } from '@/mcp/mcp-manager.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import { createProvider } from '@/providers/factory.js';
import type { LLMProvider } from '@/providers/types.js';
import { createTaskManager } from '@/tasks/task-manager.js';
import type { TaskManager } from '@/tasks/task-manager.js';
import { createTeamCatalog } from '@/teams/team-catalog.js';
import type { TeamCatalog } from '@/teams/team-catalog.js';
import { createTeamCoordinator } from '@/teams/team-coordinator.js';
import { createToolGateway } from '@/tools/gateway/tool-gateway.js';
import { createLocalTools } from '@/tools/local-tools.js';
import { createToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolRegistry } from '@/tools/registry/tool-registry.js';
import type { ToolHandle } from '@/tools/types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface ConclaveServices {
  config: ConclaveConfig;
  teams: TeamCatalog;
  registry: ToolRegistry;
  store: ConversationStore;
  taskManager: TaskManager;
  mcpManager: MCPManager;
  /** Cancel running tasks, then disconnect MCP servers. */
  shutdown(): Promise<void>;
}

export interface BootstrapOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  createProvider?: (config: LLMProviderConfig) => LLMProvider;
  mcpManager?: MCPManager;
  store?: ConversationStore;
}

// ─── Tool Catalog ───────────────────────────────────────────────

/** MCP tools win over local tools of the same name. */
export function composeTools(local: readonly ToolHandle[], remote: readonly ToolHandle[]): ToolHandle[] {
  const claimed = new Set(remote.map((t) => t.name));
  return [...local.filter((t) => !claimed.has(t.name)), ...remote];
}

// ─── Bootstrap ──────────────────────────────────────────────────

/**
 * Build every service from a validated config. Connects MCP servers, so
 * callers must invoke `shutdown()` when done.
 *
 * @throws ProviderError when an agent's backend cannot be configured (e.g. missing API key).
 */
export async function bootstrap(config: ConclaveConfig, options?: BootstrapOptions): Promise<ConclaveServices> {
  const logger = options?.logger ?? createLogger({ name: 'conclave' });
  const makeProvider = options?.createProvider ?? createProvider;
  const teams = createTeamCatalog(config);

  // One backend client per agent, created up front so a missing key fails at startup
  const providers = new Map<string, LLMProvider>();
  for (const team of teams.list()) {
    for (const agent of team.agents) {
      if (!providers.has(agent.name)) providers.set(agent.name, makeProvider(agent.llm));
    }
  }

  const mcpManager = options?.mcpManager ?? createMCPManager({ timeoutMs: config.tools.timeoutMs });
  await mcpManager.connectAll(config.mcpServers);

  const registry = createToolRegistry(
    composeTools(createLocalTools(config.tools, options?.env), mcpManager.getTools()),
  );
  const gateway = createToolGateway({
    registry,
    timeoutMs: config.tools.timeoutMs,
    maxRetries: config.tools.maxRetries,
    retryDelayMs: config.tools.retryDelayMs,
    logger,
  });
  const store = options?.store ?? createFileConversationStore({ dir: config.storage.dir, logger });

  const coordinator = createTeamCoordinator({
    store,
    gateway,
    completionToken: config.coordinator.completionToken,
    maxStepRetries: config.coordinator.maxStepRetries,
    stepRetryDelayMs: config.coordinator.stepRetryDelayMs,
    logger,
    createRuntime: ({ agent, teammates, guidance }) => {
      const provider = providers.get(agent.name) ?? makeProvider(agent.llm);
      return createAgentRuntime({
        agent,
        provider,
        registry,
        completionToken: config.coordinator.completionToken,
        teammates,
        guidance,
        logger,
      });
    },
  });
  const taskManager = createTaskManager({ coordinator, teams, store, logger });

  logger.info('Conclave services ready', {
    component: 'bootstrap',
    teams: teams.list().map((t) => t.name),
    tools: registry.listAll(),
    registryVersion: registry.version,
  });

  return {
    config,
    teams,
    registry,
    store,
    taskManager,
    mcpManager,
    async shutdown() {
      await taskManager.shutdown();
      await mcpManager.disconnectAll();
    },
  };
}
