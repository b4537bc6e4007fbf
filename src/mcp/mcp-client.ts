/**
 * Creates MCP connections using the @modelcontextprotocol/sdk.
 * Supports stdio (subprocess) and SSE (HTTP) transports.
 * Returns our MCPConnection interface, hiding SDK details from the rest of the system.
 */
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '@/observability/logger.js';
import type {
  MCPCallOptions,
  MCPServerConfig,
  MCPConnection,
  MCPConnectionStatus,
  MCPToolInfo,
  MCPToolResult,
} from './types.js';
import { MCPConnectionError, MCPTimeoutError } from './errors.js';

const logger = createLogger({ name: 'mcp-client' });

/** The SDK's request timeout when none is given. */
const SDK_DEFAULT_TIMEOUT_MS = 60_000;

const contentSchema = z.array(
  z.object({
    type: z.string(),
    text: z.string().optional(),
    data: z.string().optional(),
    mimeType: z.string().optional(),
  }),
);

/** Options for creating an MCP connection. */
export interface CreateMCPConnectionOptions {
  config: MCPServerConfig;
  /** Connection timeout in milliseconds. Defaults to 30000. */
  timeoutMs?: number;
}

/**
 * Creates a live connection to an MCP server.
 * Handles transport creation, env var resolution, and SDK initialization.
 */
export async function createMCPConnection(
  options: CreateMCPConnectionOptions,
): Promise<MCPConnection> {
  const { config, timeoutMs = 30_000 } = options;

  logger.info('Connecting to MCP server', {
    component: 'mcp-client',
    serverName: config.name,
    transport: config.transport,
  });

  const client = new Client(
    { name: 'conclave', version: '0.1.0' },
    { capabilities: {} },
  );

  const transport = createTransport(config);

  try {
    await client.connect(transport, { timeout: timeoutMs });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MCPConnectionError(config.name, message, error);
  }

  logger.info('MCP server connected', {
    component: 'mcp-client',
    serverName: config.name,
  });

  let status: MCPConnectionStatus = 'connected';

  transport.onclose = () => {
    status = 'disconnected';
    logger.info('MCP server disconnected', {
      component: 'mcp-client',
      serverName: config.name,
    });
  };

  transport.onerror = (error: Error) => {
    status = 'error';
    logger.error('MCP server transport error', {
      component: 'mcp-client',
      serverName: config.name,
      error: error.message,
    });
  };

  return {
    get serverName() {
      return config.name;
    },

    get status() {
      return status;
    },

    async listTools(): Promise<MCPToolInfo[]> {
      const result = await client.listTools();
      return result.tools.map((t) => ({
        name: t.name,
        description: t.description ?? '',
        inputSchema: t.inputSchema,
      }));
    },

    async callTool(
      name: string,
      args: Record<string, unknown>,
      callOptions?: MCPCallOptions,
    ): Promise<MCPToolResult> {
      if (status !== 'connected') {
        throw new MCPConnectionError(config.name, `connection is ${status}`);
      }

      let result: Awaited<ReturnType<typeof client.callTool>>;
      try {
        result = await client.callTool({ name, arguments: args }, undefined, {
          signal: callOptions?.signal,
          timeout: callOptions?.timeoutMs,
        });
      } catch (error: unknown) {
        if (error instanceof McpError && error.code === ErrorCode.RequestTimeout) {
          throw new MCPTimeoutError(config.name, `tools/call ${name}`, callOptions?.timeoutMs ?? SDK_DEFAULT_TIMEOUT_MS);
        }
        if (error instanceof McpError && error.code === ErrorCode.ConnectionClosed) {
          throw new MCPConnectionError(config.name, error.message, error);
        }
        throw error;
      }

      // Older servers answer with { toolResult } instead of content items
      const content = contentSchema.safeParse(result.content);
      if (!content.success) {
        return { content: [{ type: 'text', text: JSON.stringify(result) }] };
      }
      return {
        content: content.data,
        isError: result.isError === true ? true : undefined,
      };
    },

    async close(): Promise<void> {
      status = 'disconnected';
      await transport.close();
      logger.info('MCP connection closed', {
        component: 'mcp-client',
        serverName: config.name,
      });
    },
  };
}

/**
 * Creates the appropriate transport based on server config.
 * Resolves env var names to actual values from process.env.
 */
function createTransport(config: MCPServerConfig): StdioClientTransport | SSEClientTransport {
  switch (config.transport) {
    case 'stdio': {
      if (!config.command) {
        throw new MCPConnectionError(config.name, 'stdio transport requires a "command" field');
      }

      return new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: { ...getDefaultEnvironment(), ...resolveEnvVars(config.env) },
        stderr: 'pipe',
      });
    }
    case 'sse': {
      if (!config.url) {
        throw new MCPConnectionError(config.name, 'sse transport requires a "url" field');
      }
      return new SSEClientTransport(new URL(config.url));
    }
  }
}

/**
 * Resolves environment variable references.
 * Config values are env var NAMES (e.g. { GITHUB_TOKEN: "MY_GITHUB_TOKEN" }),
 * and we resolve them to actual values from process.env.
 */
function resolveEnvVars(envConfig: Record<string, string> | undefined): Record<string, string> {
  if (!envConfig) return {};

  const resolved: Record<string, string> = {};
  for (const [key, envVarName] of Object.entries(envConfig)) {
    const value = process.env[envVarName];
    if (value !== undefined) {
      resolved[key] = value;
    } else {
      logger.warn('MCP env var not found', {
        component: 'mcp-client',
        key,
        envVarName,
      });
    }
  }
  return resolved;
}
