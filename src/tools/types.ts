import type { z } from 'zod';
import type { TaskId, ToolCallId } from '@/core/types.js';
import type { Result } from '@/core/result.js';
import type { ConclaveError } from '@/core/errors.js';

// ─── Provider Reference ─────────────────────────────────────────

/** Where a tool is served from: an in-process handler or a named MCP server. */
export type ToolProviderRef = { kind: 'local' } | { kind: 'mcp'; serverName: string };

// ─── Invocation ─────────────────────────────────────────────────

export interface ToolInvocationContext {
  taskId: TaskId;
  callId: ToolCallId;
  agentName: string;
  /** Fires on timeout or task cancellation. Handlers must stop work when it does. */
  signal: AbortSignal;
}

// ─── Tool Handle ────────────────────────────────────────────────

export interface ToolHandle {
  readonly name: string;
  readonly description: string;
  /** Validates arguments before any provider is contacted. */
  readonly inputSchema: z.ZodType;
  /** Parameter schema shown to the LLM; derived from inputSchema when absent. */
  readonly jsonSchema?: Record<string, unknown>;
  readonly provider: ToolProviderRef;

  /**
   * Run the tool with already-validated input.
   * Expected failures come back as `err`; thrown errors are normalized by the gateway.
   */
  invoke(input: unknown, context: ToolInvocationContext): Promise<Result<unknown, ConclaveError>>;
}

/** Public description of a registered tool, as listed by the API. */
export interface ToolCatalogEntry {
  name: string;
  description: string;
  provider: ToolProviderRef;
}
