import { nanoid } from 'nanoid';
import { TaskStateError } from './errors.js';
import type { Result } from './result.js';
import { err, ok } from './result.js';
import type { Task, TaskId, TaskStatus, ToolCallId } from './types.js';

// ─── Identifiers ────────────────────────────────────────────────

export function createTaskId(): TaskId {
  return `task_${nanoid(16)}` as TaskId;
}

export function createToolCallId(): ToolCallId {
  return `call_${nanoid(16)}` as ToolCallId;
}

/** Brand an id that arrives as a plain string (storage, HTTP, CLI). */
export function asTaskId(value: string): TaskId {
  return value as TaskId;
}

export function asToolCallId(value: string): ToolCallId {
  return value as ToolCallId;
}

/** Create a task in the pending state. */
export function createTask(description: string, teamName: string, now = new Date()): Task {
  return {
    id: createTaskId(),
    description,
    teamName,
    createdAt: now,
    status: 'pending',
  };
}

// ─── Status Transitions ─────────────────────────────────────────

const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['running', 'failed'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: TaskStatus): status is 'completed' | 'failed' {
  return status === 'completed' || status === 'failed';
}

/**
 * Validate a status change. Status only moves forward; a terminal task never
 * returns to pending or running.
 */
export function transitionTaskStatus(
  taskId: TaskId,
  current: TaskStatus,
  next: TaskStatus,
): Result<TaskStatus, TaskStateError> {
  if (!ALLOWED_TRANSITIONS[current].includes(next)) {
    return err(new TaskStateError(taskId, current, next));
  }
  return ok(next);
}
