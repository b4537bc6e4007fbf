import { readdir } from 'node:fs/promises';
import { z } from 'zod';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import { defineLocalTool } from '../define-tool.js';
import type { ToolHandle } from '../types.js';
import { confineToWorkspace, fsErrorCode } from './workspace.js';

const inputSchema = z.object({
  path: z.string().min(1).default('.').describe('Directory relative to the workspace (default: workspace root)'),
});

export interface ListFilesToolOptions {
  workspaceDir: string;
}

/** list_files: one level of a workspace directory, directories first. */
export function createListFilesTool(options: ListFilesToolOptions): ToolHandle {
  return defineLocalTool({
    name: 'list_files',
    description: 'Lists the files and directories in a workspace directory.',
    inputSchema,

    async run(input) {
      const resolved = await confineToWorkspace('list_files', options.workspaceDir, input.path);
      if (!resolved.ok) return resolved;
      const { absolute, relative } = resolved.value;

      try {
        const dirents = await readdir(absolute, { withFileTypes: true });
        const entries = dirents
          .map((d) => ({ name: d.name, type: d.isDirectory() ? 'directory' : 'file' }))
          .sort((a, b) => (a.type === b.type ? a.name.localeCompare(b.name) : a.type === 'directory' ? -1 : 1));
        return ok({ path: relative, entries });
      } catch (error) {
        const code = fsErrorCode(error);
        if (code === 'ENOENT') {
          return err(new ToolExecutionError('list_files', `Directory not found: ${relative}`));
        }
        if (code === 'ENOTDIR') {
          return err(new ToolExecutionError('list_files', `"${relative}" is not a directory`));
        }
        const message = error instanceof Error ? error.message : String(error);
        return err(new ToolExecutionError('list_files', message, error));
      }
    },
  });
}
