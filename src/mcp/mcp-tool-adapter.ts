/**
 * Adapts MCP server tools into ToolHandles.
 * Once adapted, MCP tools are indistinguishable from local tools in the
 * ToolRegistry and the gateway; they keep the name the server gives them.
 */
import { z } from 'zod';
import { ConclaveError } from '@/core/errors.js';
import { ok, err } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolHandle } from '@/tools/types.js';
import type { MCPConnection, MCPToolInfo, MCPToolResult } from './types.js';
import { MCPToolExecutionError } from './errors.js';

const logger = createLogger({ name: 'mcp-tool-adapter' });

/**
 * MCP servers define their own JSON Schema; locally we only require an
 * object and let the server reject invalid input.
 */
const mcpInputSchema = z.record(z.string(), z.unknown());

export interface MCPToolAdapterOptions {
  serverName: string;
  toolInfo: MCPToolInfo;
  connection: MCPConnection;
}

/** Join the text items of a result; non-text items are skipped. */
export function extractText(result: MCPToolResult): string {
  return result.content
    .filter((c): c is typeof c & { text: string } => c.type === 'text' && typeof c.text === 'string')
    .map((c) => c.text)
    .join('\n');
}

export function createMCPToolHandle(options: MCPToolAdapterOptions): ToolHandle {
  const { serverName, toolInfo, connection } = options;

  return {
    name: toolInfo.name,
    description: toolInfo.description ? toolInfo.description : `MCP tool from ${serverName}`,
    inputSchema: mcpInputSchema,
    jsonSchema: getMCPToolInputSchema(toolInfo),
    provider: { kind: 'mcp', serverName },

    async invoke(input, context) {
      const parsed = mcpInputSchema.safeParse(input);
      if (!parsed.success) {
        return err(new MCPToolExecutionError(serverName, toolInfo.name, 'arguments must be an object'));
      }

      const startTime = Date.now();
      try {
        const mcpResult = await connection.callTool(toolInfo.name, parsed.data, { signal: context.signal });
        const output = extractText(mcpResult);
        const durationMs = Date.now() - startTime;

        if (mcpResult.isError) {
          logger.warn('MCP tool returned error', {
            component: 'mcp-tool-adapter',
            taskId: context.taskId,
            tool: toolInfo.name,
            serverName,
            output,
            durationMs,
          });
          return err(
            new MCPToolExecutionError(serverName, toolInfo.name, output !== '' ? output : 'MCP tool returned an error'),
          );
        }

        logger.debug('MCP tool executed successfully', {
          component: 'mcp-tool-adapter',
          taskId: context.taskId,
          tool: toolInfo.name,
          serverName,
          durationMs,
        });
        return ok(output);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('MCP tool execution failed', {
          component: 'mcp-tool-adapter',
          taskId: context.taskId,
          tool: toolInfo.name,
          serverName,
          error: message,
          durationMs: Date.now() - startTime,
        });

        // Connection and timeout errors keep their codes for the gateway
        if (error instanceof ConclaveError) return err(error);
        return err(new MCPToolExecutionError(serverName, toolInfo.name, message, error));
      }
    },
  };
}

/**
 * Get the JSON Schema for an MCP tool's input, suitable for LLM providers.
 * Falls back to an empty object schema if the MCP server doesn't provide one.
 */
export function getMCPToolInputSchema(toolInfo: MCPToolInfo): Record<string, unknown> {
  const schema = toolInfo.inputSchema;
  if (Object.keys(schema).length === 0) {
    return { type: 'object', properties: {} };
  }
  // OpenAI requires type: "object" at the top level
  if (!('type' in schema)) {
    return { type: 'object', properties: {}, ...schema };
  }
  return schema;
}
