/**
 * MCP-specific error classes.
 * The gateway maps their codes onto tool error codes: connection errors are
 * transient, timeouts are timeouts, everything else is an execution error.
 */
import { ConclaveError } from '@/core/errors.js';

/** Connecting to an MCP server failed, or the connection was lost. */
export class MCPConnectionError extends ConclaveError {
  constructor(serverName: string, message: string, cause?: unknown) {
    super({
      message: `MCP server "${serverName}" connection failed: ${message}`,
      code: 'MCP_CONNECTION_ERROR',
      statusCode: 503,
      cause,
      context: { serverName },
    });
    this.name = 'MCPConnectionError';
  }
}

/** Thrown when calling a tool on an MCP server fails. */
export class MCPToolExecutionError extends ConclaveError {
  constructor(serverName: string, toolName: string, message: string, cause?: unknown) {
    super({
      message: `MCP tool "${toolName}" on "${serverName}" failed: ${message}`,
      code: 'MCP_TOOL_EXECUTION_ERROR',
      statusCode: 502,
      cause,
      context: { serverName, toolName },
    });
    this.name = 'MCPToolExecutionError';
  }
}

/** Thrown when an MCP operation exceeds its timeout. */
export class MCPTimeoutError extends ConclaveError {
  constructor(serverName: string, operation: string, timeoutMs: number) {
    super({
      message: `MCP server "${serverName}" timed out during ${operation} after ${timeoutMs}ms`,
      code: 'MCP_TIMEOUT',
      statusCode: 504,
      context: { serverName, operation, timeoutMs },
    });
    this.name = 'MCPTimeoutError';
  }
}
