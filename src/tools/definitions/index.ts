export { createReadFileTool } from './read-file.js';
export type { ReadFileToolOptions } from './read-file.js';
export { createWriteFileTool } from './write-file.js';
export type { WriteFileToolOptions } from './write-file.js';
export { createListFilesTool } from './list-files.js';
export type { ListFilesToolOptions } from './list-files.js';
export { createWebSearchTool } from './web-search.js';
export type { WebSearchToolOptions } from './web-search.js';
export { createGitHubTools } from './github.js';
export type { GitHubToolsOptions } from './github.js';
export { confineToWorkspace, resolveInWorkspace } from './workspace.js';
export type { WorkspacePath } from './workspace.js';
