// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a ToolCallId where a TaskId is expected.

export declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type TaskId = Brand<string, 'TaskId'>;
export type ToolCallId = Brand<string, 'ToolCallId'>;

// ─── LLM Provider Config ────────────────────────────────────────

export interface LLMProviderConfig {
  /** Provider identifier. Groq and Ollama are reached through their OpenAI-compatible APIs. */
  provider: 'openai' | 'anthropic' | 'groq' | 'ollama';
  /** Model identifier (e.g. 'llama3-8b-8192', 'gpt-4o'). */
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** References an env var name, never the raw key. */
  apiKeyEnvVar?: string;
  baseUrl?: string;
}

// ─── Task ───────────────────────────────────────────────────────

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface Task {
  id: TaskId;
  description: string;
  /** Team the task was submitted to. */
  teamName: string;
  createdAt: Date;
  status: TaskStatus;
}

/** Failure codes reported on a failed TaskOutcome. */
export type TaskFailureCode =
  | 'TURN_LIMIT_EXCEEDED'
  | 'BACKEND_UNAVAILABLE'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface TaskFailureReason {
  code: TaskFailureCode;
  message: string;
}

export interface TaskOutcome {
  taskId: TaskId;
  status: 'completed' | 'failed';
  /** Final summary for completed tasks, last agent message otherwise. */
  summary: string;
  reason?: TaskFailureReason;
  /** Agent turns taken. */
  turns: number;
}

// ─── Tool Calls ─────────────────────────────────────────────────

export interface ToolCall {
  id: ToolCallId;
  taskId: TaskId;
  requesterAgent: string;
  toolName: string;
  arguments: Record<string, unknown>;
  issuedAt: Date;
}

export type ToolErrorCode =
  | 'TOOL_NOT_PERMITTED'
  | 'UNKNOWN_TOOL'
  | 'TOOL_TIMEOUT'
  | 'TOOL_TRANSIENT_ERROR'
  | 'TOOL_VALIDATION_ERROR'
  | 'TOOL_EXECUTION_ERROR'
  | 'TOOL_INTERRUPTED'
  | 'CANCELLED';

export interface ToolErrorDetail {
  code: ToolErrorCode;
  message: string;
  retryable: boolean;
}

export interface ToolResultBase {
  callId: ToolCallId;
  /** Provider invocations made; 0 when the call was rejected before reaching a provider. */
  attempts: number;
  durationMs: number;
  completedAt: Date;
}

export type ToolResult =
  | (ToolResultBase & { status: 'ok'; payload: unknown })
  | (ToolResultBase & { status: 'error'; error: ToolErrorDetail });

// ─── Conversation Messages ──────────────────────────────────────

export type MessageRole = 'user' | 'agent' | 'tool' | 'system';

interface MessageBase {
  taskId: TaskId;
  /** 1-based, gapless, strictly increasing per task. */
  seq: number;
  sender: string;
  content: string;
  timestamp: Date;
}

/** The submitted task description. Always seq 1. */
export interface TaskMessage extends MessageBase {
  kind: 'task';
  role: 'user';
}

export interface ChatMessage extends MessageBase {
  kind: 'chat';
  role: 'agent';
  turn: number;
  /** Set when the agent emitted the completion signal. */
  final: boolean;
}

export interface ToolCallMessage extends MessageBase {
  kind: 'tool_call';
  role: 'agent';
  turn: number;
  toolCall: ToolCall;
}

export interface ToolResultMessage extends MessageBase {
  kind: 'tool_result';
  role: 'tool';
  toolResult: ToolResult;
}

/** Private note to one agent after it produced unusable output. */
export interface CorrectionMessage extends MessageBase {
  kind: 'correction';
  role: 'system';
  turn: number;
  audience: string;
}

/** Lead's pick under coordinator-directed routing. */
export interface SpeakerSelectionMessage extends MessageBase {
  kind: 'speaker_selection';
  role: 'system';
  nextSpeaker: string;
}

export type ConversationMessage =
  | TaskMessage
  | ChatMessage
  | ToolCallMessage
  | ToolResultMessage
  | CorrectionMessage
  | SpeakerSelectionMessage;

/** Messages produced by an agent step; these are the ones that carry a turn number. */
export type TurnMessage = ChatMessage | ToolCallMessage | CorrectionMessage;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A message before the coordinator has given it a position in the record. */
export type DraftMessage = DistributiveOmit<ConversationMessage, 'seq' | 'taskId' | 'timestamp'>;

export function isTurnMessage(message: ConversationMessage): message is TurnMessage {
  return message.kind === 'chat' || message.kind === 'tool_call' || message.kind === 'correction';
}
