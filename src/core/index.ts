// Core module: shared types, results, errors and task lifecycle
export type {
  ChatMessage,
  ConversationMessage,
  CorrectionMessage,
  DraftMessage,
  LLMProviderConfig,
  MessageRole,
  SpeakerSelectionMessage,
  Task,
  TaskFailureCode,
  TaskFailureReason,
  TaskId,
  TaskMessage,
  TaskOutcome,
  TaskStatus,
  ToolCall,
  ToolCallId,
  ToolCallMessage,
  ToolErrorCode,
  ToolErrorDetail,
  ToolResult,
  ToolResultMessage,
  TurnMessage,
} from './types.js';
export { isTurnMessage } from './types.js';

export type { Result } from './result.js';
export { ok, err, isOk, isErr, mapErr, unwrap } from './result.js';

export {
  ConclaveError,
  ToolNotPermittedError,
  UnknownToolError,
  ToolTimeoutError,
  ToolTransientError,
  ToolValidationError,
  ToolExecutionError,
  ProviderError,
  BackendUnavailableError,
  TurnLimitExceededError,
  TaskCancelledError,
  TaskStateError,
  TeamMismatchError,
  ConversationStoreError,
  ValidationError,
  NotFoundError,
} from './errors.js';

export {
  asTaskId,
  asToolCallId,
  createTask,
  createTaskId,
  createToolCallId,
  isTerminalStatus,
  transitionTaskStatus,
} from './task.js';
export { sleep } from './sleep.js';
