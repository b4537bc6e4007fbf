import type {
  ConversationMessage,
  Task,
  TaskFailureReason,
  TaskId,
  TaskOutcome,
  TaskStatus,
} from '@/core/types.js';
import type { ConversationStoreError, NotFoundError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { TeamSnapshot } from '@/teams/types.js';

// ─── Entries ────────────────────────────────────────────────────

/**
 * One durable line of a task's log. A log is a `task` header followed by
 * status changes and messages in the order they happened.
 */
export type ConversationEntry =
  | { type: 'task'; task: Task; team: TeamSnapshot }
  | {
      type: 'status';
      status: TaskStatus;
      at: Date;
      /** Present on `failed`. */
      reason?: TaskFailureReason;
      /** Present on terminal statuses. */
      summary?: string;
      turns?: number;
    }
  | { type: 'message'; message: ConversationMessage };

// ─── Record ─────────────────────────────────────────────────────

/** Everything known about one task, rebuilt from its entries. */
export interface ConversationRecord {
  /** `status` is the latest recorded one. */
  task: Task;
  team: TeamSnapshot;
  /** In seq order, starting at 1. */
  messages: readonly ConversationMessage[];
  /** Set once a terminal status is recorded. */
  outcome?: TaskOutcome;
}

// ─── Store ──────────────────────────────────────────────────────

export interface ConversationStore {
  /**
   * Validate and durably append one entry; resolves with the updated record
   * once the entry is stored. Writes for one task are applied in call order.
   */
  append(taskId: TaskId, entry: ConversationEntry): Promise<Result<ConversationRecord, ConversationStoreError>>;

  load(taskId: TaskId): Promise<Result<ConversationRecord, ConversationStoreError | NotFoundError>>;

  /** Every stored task, oldest first. */
  list(): Promise<Task[]>;
}
