/**
 * Manages the MCP server connections of a running instance.
 * Servers are connected once at startup; their tools become ToolHandles
 * that the registry is built from.
 */
import { createLogger } from '@/observability/logger.js';
import type { ToolHandle } from '@/tools/types.js';
import type { MCPServerConfig, MCPConnection } from './types.js';
import { createMCPConnection } from './mcp-client.js';
import { createMCPToolHandle } from './mcp-tool-adapter.js';

const logger = createLogger({ name: 'mcp-manager' });

export interface MCPServerStatus {
  name: string;
  status: string;
  toolCount: number;
}

export interface MCPManager {
  /** Connect to all configured MCP servers. Failures are logged and skipped. */
  connectAll(configs: MCPServerConfig[]): Promise<void>;
  disconnectAll(): Promise<void>;
  listConnections(): MCPServerStatus[];
  /** Tools from every connected server, in config order. */
  getTools(): ToolHandle[];
}

export interface MCPManagerOptions {
  /** Connection timeout per server in milliseconds. Defaults to 30000. */
  timeoutMs?: number;
}

interface ConnectedServer {
  connection: MCPConnection;
  tools: ToolHandle[];
}

/**
 * Creates a manager that handles multiple MCP server connections.
 * Failed connections are logged and skipped; agents run without those tools.
 */
export function createMCPManager(options?: MCPManagerOptions): MCPManager {
  const timeoutMs = options?.timeoutMs ?? 30_000;
  const servers = new Map<string, ConnectedServer>();

  async function connectOne(config: MCPServerConfig): Promise<ConnectedServer> {
    const connection = await createMCPConnection({ config, timeoutMs });
    try {
      const discovered = await connection.listTools();
      const capabilities = config.capabilities ?? [];
      const selected =
        capabilities.length > 0 ? discovered.filter((t) => capabilities.includes(t.name)) : discovered;

      const missing = capabilities.filter((name) => !discovered.some((t) => t.name === name));
      if (missing.length > 0) {
        logger.warn('MCP server does not offer declared capabilities', {
          component: 'mcp-manager',
          serverName: config.name,
          missing,
        });
      }

      logger.info('Discovered MCP tools', {
        component: 'mcp-manager',
        serverName: config.name,
        discovered: discovered.length,
        tools: selected.map((t) => t.name),
      });

      return {
        connection,
        tools: selected.map((toolInfo) => createMCPToolHandle({ serverName: config.name, toolInfo, connection })),
      };
    } catch (error: unknown) {
      await connection.close();
      throw error;
    }
  }

  return {
    async connectAll(configs: MCPServerConfig[]): Promise<void> {
      const results = await Promise.allSettled(configs.map(connectOne));

      const claimed = new Map<string, string>();
      results.forEach((result, index) => {
        const config = configs[index];
        if (!config) return;

        if (result.status === 'rejected') {
          const reason: unknown = result.reason;
          logger.error('Failed to connect to MCP server', {
            component: 'mcp-manager',
            serverName: config.name,
            error: reason instanceof Error ? reason.message : String(reason),
          });
          return;
        }

        // Two servers offering the same tool: the one listed first keeps it
        const tools = result.value.tools.filter((tool) => {
          const owner = claimed.get(tool.name);
          if (owner !== undefined) {
            logger.warn('MCP tool already provided by another server', {
              component: 'mcp-manager',
              tool: tool.name,
              serverName: config.name,
              owner,
            });
            return false;
          }
          claimed.set(tool.name, config.name);
          return true;
        });
        servers.set(config.name, { connection: result.value.connection, tools });
      });

      logger.info('MCP manager initialization complete', {
        component: 'mcp-manager',
        connected: servers.size,
        failed: configs.length - servers.size,
        totalTools: claimed.size,
      });
    },

    async disconnectAll(): Promise<void> {
      const closing = [...servers.values()].map((s) => s.connection.close());
      const results = await Promise.allSettled(closing);
      for (const result of results) {
        if (result.status === 'rejected') {
          const reason: unknown = result.reason;
          logger.warn('Error closing MCP connection', {
            component: 'mcp-manager',
            error: reason instanceof Error ? reason.message : String(reason),
          });
        }
      }
      servers.clear();

      logger.info('All MCP servers disconnected', { component: 'mcp-manager' });
    },

    listConnections(): MCPServerStatus[] {
      return [...servers.entries()].map(([name, server]) => ({
        name,
        status: server.connection.status,
        toolCount: server.tools.length,
      }));
    },

    getTools(): ToolHandle[] {
      return [...servers.values()].flatMap((s) => s.tools);
    },
  };
}
