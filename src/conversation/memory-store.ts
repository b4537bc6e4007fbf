import { NotFoundError } from '@/core/errors.js';
import { err, ok } from '@/core/result.js';
import type { Task, TaskId } from '@/core/types.js';
import { applyEntry } from './conversation-record.js';
import type { ConversationRecord, ConversationStore } from './types.js';

/** In-process store for tests and one-shot CLI runs. Nothing survives a restart. */
export function createMemoryConversationStore(): ConversationStore {
  const records = new Map<TaskId, ConversationRecord>();

  return {
    async append(taskId, entry) {
      const applied = applyEntry(taskId, records.get(taskId), entry);
      if (applied.ok) records.set(taskId, applied.value);
      return applied;
    },

    async load(taskId) {
      const record = records.get(taskId);
      return record ? ok(record) : err(new NotFoundError('Task', taskId));
    },

    async list(): Promise<Task[]> {
      return [...records.values()]
        .map((record) => record.task)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    },
  };
}
