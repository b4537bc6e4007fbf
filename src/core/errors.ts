/**
 * Base error class for all Conclave errors.
 * Carries a machine-readable code, an HTTP status for the API surface, and structured context.
 */
export class ConclaveError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: unknown;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'ConclaveError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

// ─── Tool Dispatch ──────────────────────────────────────────────

/** An agent asked for a tool outside its allow-list. */
export class ToolNotPermittedError extends ConclaveError {
  constructor(toolName: string, agentName: string) {
    super({
      message: `Agent "${agentName}" is not permitted to use tool "${toolName}"`,
      code: 'TOOL_NOT_PERMITTED',
      statusCode: 403,
      context: { toolName, agentName },
    });
    this.name = 'ToolNotPermittedError';
  }
}

/** The requested tool is not in the registry. */
export class UnknownToolError extends ConclaveError {
  constructor(toolName: string, availableTools: string[]) {
    super({
      message: `Unknown tool "${toolName}"`,
      code: 'UNKNOWN_TOOL',
      statusCode: 404,
      context: { toolName, availableTools },
    });
    this.name = 'UnknownToolError';
  }
}

export class ToolTimeoutError extends ConclaveError {
  constructor(toolName: string, timeoutMs: number) {
    super({
      message: `Tool "${toolName}" did not respond within ${timeoutMs}ms`,
      code: 'TOOL_TIMEOUT',
      statusCode: 504,
      context: { toolName, timeoutMs },
    });
    this.name = 'ToolTimeoutError';
  }
}

/** A failure worth retrying: dropped connection, refused socket, DNS hiccup. */
export class ToolTransientError extends ConclaveError {
  constructor(toolName: string, message: string, cause?: unknown) {
    super({
      message: `Tool "${toolName}" failed transiently: ${message}`,
      code: 'TOOL_TRANSIENT_ERROR',
      statusCode: 503,
      cause,
      context: { toolName },
    });
    this.name = 'ToolTransientError';
  }
}

export class ToolValidationError extends ConclaveError {
  constructor(toolName: string, message: string, context?: Record<string, unknown>) {
    super({
      message: `Invalid arguments for tool "${toolName}": ${message}`,
      code: 'TOOL_VALIDATION_ERROR',
      statusCode: 400,
      context: { toolName, ...context },
    });
    this.name = 'ToolValidationError';
  }
}

export class ToolExecutionError extends ConclaveError {
  constructor(toolName: string, message: string, cause?: unknown) {
    super({
      message: `Tool "${toolName}" failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      statusCode: 500,
      cause,
      context: { toolName },
    });
    this.name = 'ToolExecutionError';
  }
}

// ─── LLM Backend ────────────────────────────────────────────────

/** Thrown by provider adapters when an LLM API call fails. */
export class ProviderError extends ConclaveError {
  constructor(provider: string, message: string, cause?: unknown) {
    super({
      message: `Provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** The LLM backend could not produce a response for an agent step. */
export class BackendUnavailableError extends ConclaveError {
  constructor(agentName: string, message: string, cause?: unknown) {
    super({
      message: `LLM backend unavailable for agent "${agentName}": ${message}`,
      code: 'BACKEND_UNAVAILABLE',
      statusCode: 503,
      cause,
      context: { agentName },
    });
    this.name = 'BackendUnavailableError';
  }
}

// ─── Task Lifecycle ─────────────────────────────────────────────

export class TurnLimitExceededError extends ConclaveError {
  constructor(taskId: string, maxTurns: number) {
    super({
      message: `Task ${taskId} reached the limit of ${maxTurns} turns without completing`,
      code: 'TURN_LIMIT_EXCEEDED',
      statusCode: 422,
      context: { taskId, maxTurns },
    });
    this.name = 'TurnLimitExceededError';
  }
}

export class TaskCancelledError extends ConclaveError {
  constructor(taskId: string, message = 'Task was cancelled') {
    super({
      message,
      code: 'CANCELLED',
      statusCode: 409,
      context: { taskId },
    });
    this.name = 'TaskCancelledError';
  }
}

/** An illegal task status transition was attempted. */
export class TaskStateError extends ConclaveError {
  constructor(taskId: string, from: string, to: string) {
    super({
      message: `Task ${taskId} cannot move from "${from}" to "${to}"`,
      code: 'INVALID_TASK_TRANSITION',
      statusCode: 409,
      context: { taskId, from, to },
    });
    this.name = 'TaskStateError';
  }
}

/** The team supplied on resume does not match the one the task started with. */
export class TeamMismatchError extends ConclaveError {
  constructor(taskId: string, expected: string, actual: string) {
    super({
      message: `Task ${taskId} was started by team "${expected}" and cannot be resumed by "${actual}" or a modified team`,
      code: 'TEAM_MISMATCH',
      statusCode: 409,
      context: { taskId, expected, actual },
    });
    this.name = 'TeamMismatchError';
  }
}

// ─── Persistence ────────────────────────────────────────────────

export class ConversationStoreError extends ConclaveError {
  constructor(taskId: string, message: string, cause?: unknown) {
    super({
      message: `Conversation record for task ${taskId}: ${message}`,
      code: 'CONVERSATION_STORE_ERROR',
      statusCode: 500,
      cause,
      context: { taskId },
    });
    this.name = 'ConversationStoreError';
  }
}

// ─── Generic ────────────────────────────────────────────────────

export class ValidationError extends ConclaveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ConclaveError {
  constructor(resource: string, id: string) {
    super({
      message: `${resource} "${id}" not found`,
      code: 'NOT_FOUND',
      statusCode: 404,
      context: { resource, id },
    });
    this.name = 'NotFoundError';
  }
}
