/**
 * File Conversation Store: one append-only JSONL log per task.
 *
 * Each entry is written and fsynced before `append` resolves. Writes for the
 * same task are queued so they land in call order. A torn final line left by
 * a crash is cut off the next time the log is read.
 *
 * Only tasks still being written are kept in memory; a record leaves the
 * cache once its terminal status is stored. Reads of other tasks go to disk.
 */
import { mkdir, open, readdir, readFile, truncate } from 'node:fs/promises';
import { join } from 'node:path';
import { ConversationStoreError, NotFoundError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { asTaskId } from '@/core/task.js';
import type { Task, TaskId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import { applyEntry, replayEntries } from './conversation-record.js';
import { parseEntry } from './schema.js';
import type { ConversationEntry, ConversationRecord, ConversationStore } from './types.js';

// ─── Config ─────────────────────────────────────────────────────

export interface FileConversationStoreOptions {
  /** Directory holding `<taskId>.jsonl` files; created on first write. */
  dir: string;
  logger?: Logger;
}

const LOG_EXTENSION = '.jsonl';
const SAFE_TASK_ID = /^[A-Za-z0-9_-]+$/;

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function writeDurably(path: string, data: string): Promise<void> {
  const handle = await open(path, 'a');
  try {
    await handle.appendFile(data, 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

// ─── Store Factory ──────────────────────────────────────────────

export function createFileConversationStore(options: FileConversationStoreOptions): ConversationStore {
  const { dir } = options;
  const logger = options.logger ?? createLogger({ name: 'conversation-store' });
  const records = new Map<TaskId, ConversationRecord>();
  const queues = new Map<TaskId, Promise<void>>();

  const logPath = (taskId: TaskId): string => join(dir, `${taskId}${LOG_EXTENSION}`);

  /** Run `work` after every earlier operation on the same task has settled. */
  function enqueue<T>(taskId: TaskId, work: () => Promise<T>): Promise<T> {
    const previous = queues.get(taskId) ?? Promise.resolve();
    const next = previous.then(work);
    const settled = next.then(
      () => undefined,
      () => undefined,
    );
    queues.set(taskId, settled);
    void settled.then(() => {
      if (queues.get(taskId) === settled) queues.delete(taskId);
    });
    return next;
  }

  async function readLog(taskId: TaskId): Promise<Result<ConversationRecord | undefined, ConversationStoreError>> {
    const cached = records.get(taskId);
    if (cached) return ok(cached);

    const path = logPath(taskId);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return ok(undefined);
      return err(new ConversationStoreError(taskId, `cannot read log: ${messageOf(error)}`, error));
    }

    const lines = text.split('\n');
    // Everything after the last newline is either empty or a torn write
    const tail = lines.pop() ?? '';
    const entries: ConversationEntry[] = [];

    for (const [index, line] of lines.entries()) {
      if (line.trim() === '') continue;
      const parsed = parseEntry(line);
      if (!parsed.ok) {
        return err(new ConversationStoreError(taskId, `corrupt entry at line ${index + 1}: ${parsed.error}`));
      }
      entries.push(parsed.value);
    }

    if (tail.trim() !== '') {
      const parsed = parseEntry(tail);
      try {
        if (parsed.ok) {
          entries.push(parsed.value);
          await writeDurably(path, '\n');
        } else {
          const keptBytes = Buffer.byteLength(text, 'utf8') - Buffer.byteLength(tail, 'utf8');
          logger.warn('Dropping torn final entry', {
            component: 'conversation-store',
            taskId,
            droppedBytes: Buffer.byteLength(tail, 'utf8'),
          });
          await truncate(path, keptBytes);
        }
      } catch (error) {
        return err(new ConversationStoreError(taskId, `cannot repair log: ${messageOf(error)}`, error));
      }
    }

    return replayEntries(taskId, entries);
  }

  return {
    append(taskId, entry) {
      if (!SAFE_TASK_ID.test(taskId)) {
        return Promise.resolve(err(new ConversationStoreError(taskId, 'task id is not usable as a file name')));
      }

      return enqueue(taskId, async (): Promise<Result<ConversationRecord, ConversationStoreError>> => {
        const current = await readLog(taskId);
        if (!current.ok) return current;

        const applied = applyEntry(taskId, current.value, entry);
        if (!applied.ok) return applied;

        try {
          if (entry.type === 'task') await mkdir(dir, { recursive: true });
          await writeDurably(logPath(taskId), `${JSON.stringify(entry)}\n`);
        } catch (error) {
          // Re-read from disk next time so a partial line gets repaired
          records.delete(taskId);
          return err(new ConversationStoreError(taskId, `cannot write log: ${messageOf(error)}`, error));
        }

        if (applied.value.outcome) records.delete(taskId);
        else records.set(taskId, applied.value);
        return ok(applied.value);
      });
    },

    load(taskId) {
      if (!SAFE_TASK_ID.test(taskId)) {
        return Promise.resolve(err(new NotFoundError('Task', taskId)));
      }

      return enqueue(taskId, async (): Promise<Result<ConversationRecord, ConversationStoreError | NotFoundError>> => {
        const loaded = await readLog(taskId);
        if (!loaded.ok) return loaded;
        return loaded.value ? ok(loaded.value) : err(new NotFoundError('Task', taskId));
      });
    },

    async list(): Promise<Task[]> {
      let names: string[];
      try {
        names = await readdir(dir);
      } catch (error) {
        if (errorCode(error) === 'ENOENT') return [];
        throw error;
      }

      const tasks: Task[] = [];
      for (const name of names) {
        if (!name.endsWith(LOG_EXTENSION)) continue;
        const taskId = asTaskId(name.slice(0, -LOG_EXTENSION.length));
        if (!SAFE_TASK_ID.test(taskId)) continue;
        const loaded = await enqueue(taskId, () => readLog(taskId));
        if (!loaded.ok) {
          logger.warn('Skipping unreadable conversation log', {
            component: 'conversation-store',
            taskId,
            error: loaded.error.message,
          });
          continue;
        }
        if (loaded.value) tasks.push(loaded.value.task);
      }
      return tasks.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    },
  };
}
