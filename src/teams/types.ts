import type { AgentDefinition } from '@/agents/types.js';

// ─── Routing ────────────────────────────────────────────────────

export interface HandoffRule {
  /** Only applies after this agent spoke; any agent when absent. */
  from?: string;
  /** Case-insensitive; any one of them triggers the rule. */
  keywords: string[];
  to: string;
}

export type RoutingPolicy =
  | { type: 'round-robin' }
  | { type: 'coordinator-directed'; lead: string }
  | { type: 'handoff'; rules: HandoffRule[]; fallback: 'round-robin' | 'same-speaker' };

/** Who speaks after a tool result: the requester, or whoever the policy picks. */
export type AfterToolResult = 'same-speaker' | 'next-speaker';

// ─── Team ───────────────────────────────────────────────────────

/** Ordered set of agents working on one task. */
export interface Team {
  name: string;
  description?: string;
  /** Speaking order for round-robin; the first member opens every task. */
  agents: readonly AgentDefinition[];
  routing: RoutingPolicy;
  maxTurns: number;
  afterToolResult: AfterToolResult;
}

/**
 * The team as recorded in a task's header. A task can only be resumed by a
 * team with the same name and fingerprint.
 */
export interface TeamSnapshot {
  name: string;
  /** Hash over members, instructions, tool allow-lists, backends and policy. */
  fingerprint: string;
  members: string[];
  routing: RoutingPolicy;
  maxTurns: number;
  afterToolResult: AfterToolResult;
}
