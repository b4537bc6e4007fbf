export { createTaskManager } from './task-manager.js';
export type { SubmitError, TaskManager, TaskManagerOptions } from './task-manager.js';
