import type { LLMProviderConfig } from '@/core/types.js';

// ─── Agent Definition ───────────────────────────────────────────

/** Stateless role definition. Runtime state lives in the conversation record. */
export interface AgentDefinition {
  /** Unique within a config; also the speaker name in conversations. */
  name: string;
  /** One-line role summary shown to teammates and to the lead. */
  description?: string;
  /** Persona and working instructions. */
  instructions: string;
  allowedTools: readonly string[];
  /** Resolved backend: the global llm section merged with the agent's override. */
  llm: LLMProviderConfig;
}

/** What other agents need to know about a teammate. */
export interface TeammateInfo {
  name: string;
  description?: string;
}

// ─── Step Output ────────────────────────────────────────────────

/**
 * Parsed result of one agent step.
 * `malformed` covers output the coordinator cannot act on; it becomes a
 * correction for the agent's next turn, never a task failure.
 */
export type AgentOutput =
  | { kind: 'message'; text: string; complete: boolean }
  | { kind: 'tool_request'; toolName: string; arguments: Record<string, unknown>; text: string }
  | { kind: 'malformed'; reason: string; raw: string };
