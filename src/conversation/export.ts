import type { ConversationMessage, Task, TaskOutcome } from '@/core/types.js';
import type { TeamSnapshot } from '@/teams/types.js';
import type { ConversationRecord } from './types.js';

/** A task's full history as one JSON document. */
export interface ConversationExport {
  task: Task;
  team: TeamSnapshot;
  outcome: TaskOutcome | null;
  messages: readonly ConversationMessage[];
}

export function exportConversation(record: ConversationRecord): ConversationExport {
  return {
    task: record.task,
    team: record.team,
    outcome: record.outcome ?? null,
    messages: record.messages,
  };
}
