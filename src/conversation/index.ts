export type { ConversationEntry, ConversationRecord, ConversationStore } from './types.js';
export { applyEntry, pendingToolCalls, replayEntries, turnsTaken } from './conversation-record.js';
export { conversationEntrySchema, parseEntry } from './schema.js';
export { createMemoryConversationStore } from './memory-store.js';
export { createFileConversationStore } from './file-store.js';
export type { FileConversationStoreOptions } from './file-store.js';
export { exportConversation } from './export.js';
export type { ConversationExport } from './export.js';
