/**
 * MCP (Model Context Protocol) types for connecting external tool servers.
 * MCP servers expose tools that agents reach through the ToolGateway.
 */

// ─── Server Configuration ──────────────────────────────────────

/** Configuration for a single MCP server connection. */
export interface MCPServerConfig {
  /** Unique identifier for this server (e.g. "filesystem"). */
  name: string;
  description?: string;
  /** Transport type: stdio spawns a subprocess, sse connects via HTTP. */
  transport: 'stdio' | 'sse';
  /** For stdio: command to run (e.g. "npx"). */
  command?: string;
  /** For stdio: arguments for the command. */
  args?: string[];
  /** For stdio: env var NAMES to resolve and pass to the subprocess. */
  env?: Record<string, string>;
  /** For sse: URL of the MCP server (e.g. "http://localhost:8080/sse"). */
  url?: string;
  /**
   * Tool names this server is expected to serve. Only these are exposed;
   * an empty or missing list exposes every tool the server lists.
   */
  capabilities?: string[];
}

// ─── Connection ────────────────────────────────────────────────

export type MCPConnectionStatus = 'connected' | 'disconnected' | 'error';

export interface MCPCallOptions {
  /** Aborts the request; the server is sent a cancellation notification. */
  signal?: AbortSignal;
  /** Request timeout. Defaults to the SDK's own. */
  timeoutMs?: number;
}

/** Represents a live connection to an MCP server. */
export interface MCPConnection {
  readonly serverName: string;
  readonly status: MCPConnectionStatus;
  listTools(): Promise<MCPToolInfo[]>;
  callTool(name: string, args: Record<string, unknown>, options?: MCPCallOptions): Promise<MCPToolResult>;
  close(): Promise<void>;
}

// ─── Tool Info ─────────────────────────────────────────────────

/** Tool information as reported by an MCP server. */
export interface MCPToolInfo {
  name: string;
  description: string;
  /** JSON Schema for the tool's input parameters. */
  inputSchema: Record<string, unknown>;
}

/** Result of calling a tool on an MCP server. */
export interface MCPToolResult {
  content: MCPToolResultContent[];
  /** Whether the tool call resulted in an error. */
  isError?: boolean;
}

/** A single content item in an MCP tool result. */
export interface MCPToolResultContent {
  /** 'text', 'image' or 'resource' */
  type: string;
  text?: string;
  data?: string;
  mimeType?: string;
}
