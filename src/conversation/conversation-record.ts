/**
 * Pure rules for building a ConversationRecord out of log entries. Both
 * stores run every append through `applyEntry`, so a record on disk or in
 * memory can only ever hold a valid history.
 */
import { ConversationStoreError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { isTerminalStatus, transitionTaskStatus } from '@/core/task.js';
import type { ConversationMessage, TaskId, ToolCallMessage } from '@/core/types.js';
import { isTurnMessage } from '@/core/types.js';
import type { ConversationEntry, ConversationRecord } from './types.js';

// ─── Queries ────────────────────────────────────────────────────

/** Tool calls that have no tool_result yet, oldest first. */
export function pendingToolCalls(messages: readonly ConversationMessage[]): ToolCallMessage[] {
  const answered = new Set<string>();
  for (const message of messages) {
    if (message.kind === 'tool_result') answered.add(message.toolResult.callId);
  }
  return messages.filter(
    (message): message is ToolCallMessage => message.kind === 'tool_call' && !answered.has(message.toolCall.id),
  );
}

/** Highest turn number recorded; 0 before the first agent turn. */
export function turnsTaken(messages: readonly ConversationMessage[]): number {
  let turns = 0;
  for (const message of messages) {
    if (isTurnMessage(message) && message.turn > turns) turns = message.turn;
  }
  return turns;
}

// ─── Message Checks ─────────────────────────────────────────────

function checkMessage(record: ConversationRecord, message: ConversationMessage): string | undefined {
  const { messages } = record;
  const expectedSeq = messages.length + 1;

  if (message.taskId !== record.task.id) return `message belongs to task ${message.taskId}`;
  if (record.task.status !== 'running') return `cannot append messages while the task is ${record.task.status}`;
  if (message.seq !== expectedSeq) return `expected seq ${expectedSeq}, got ${message.seq}`;
  if (message.seq === 1 && message.kind !== 'task') return 'the first message must be the task description';
  if (message.seq !== 1 && message.kind === 'task') return 'only the first message may be the task description';

  if (isTurnMessage(message)) {
    const lastTurn = turnsTaken(messages);
    if (message.turn < lastTurn) return `turn ${message.turn} comes after turn ${lastTurn}`;
  }

  if (message.kind === 'tool_call') {
    const { id } = message.toolCall;
    if (messages.some((m) => m.kind === 'tool_call' && m.toolCall.id === id)) {
      return `duplicate tool call ${id}`;
    }
  }

  if (message.kind === 'tool_result') {
    const { callId } = message.toolResult;
    if (!pendingToolCalls(messages).some((m) => m.toolCall.id === callId)) {
      return `tool result ${callId} does not answer a pending call`;
    }
  }

  return undefined;
}

// ─── Apply ──────────────────────────────────────────────────────

/** Return the record with `entry` applied, or why the entry cannot follow it. */
export function applyEntry(
  taskId: TaskId,
  record: ConversationRecord | undefined,
  entry: ConversationEntry,
): Result<ConversationRecord, ConversationStoreError> {
  const fail = (message: string): Result<never, ConversationStoreError> =>
    err(new ConversationStoreError(taskId, message));

  if (entry.type === 'task') {
    if (record) return fail('already has a task header');
    if (entry.task.id !== taskId) return fail(`header names task ${entry.task.id}`);
    if (entry.task.status !== 'pending') return fail('a task must start pending');
    return ok({ task: entry.task, team: entry.team, messages: [] });
  }

  if (!record) return fail('the first entry must be the task header');

  if (entry.type === 'status') {
    const transition = transitionTaskStatus(taskId, record.task.status, entry.status);
    if (!transition.ok) return fail(transition.error.message);

    const task = { ...record.task, status: entry.status };
    if (!isTerminalStatus(entry.status)) return ok({ ...record, task });

    if (entry.status === 'failed' && !entry.reason) return fail('a failed status needs a reason');
    return ok({
      ...record,
      task,
      outcome: {
        taskId,
        status: entry.status,
        summary: entry.summary ?? '',
        reason: entry.reason,
        turns: entry.turns ?? turnsTaken(record.messages),
      },
    });
  }

  const problem = checkMessage(record, entry.message);
  if (problem) return fail(problem);
  return ok({ ...record, messages: [...record.messages, entry.message] });
}

/** Fold a full log. `undefined` for an empty one. */
export function replayEntries(
  taskId: TaskId,
  entries: readonly ConversationEntry[],
): Result<ConversationRecord | undefined, ConversationStoreError> {
  let record: ConversationRecord | undefined;
  for (const entry of entries) {
    const applied = applyEntry(taskId, record, entry);
    if (!applied.ok) return applied;
    record = applied.value;
  }
  return ok(record);
}
