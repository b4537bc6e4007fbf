/**
 * read_file: returns the text of a file inside the workspace.
 */
import { readFile, stat } from 'node:fs/promises';
import { z } from 'zod';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { defineLocalTool } from '../define-tool.js';
import type { ToolHandle } from '../types.js';
import { confineToWorkspace, fsErrorCode } from './workspace.js';

const logger = createLogger({ name: 'read-file' });

/** Maximum file size returned to an agent (1 MB). */
const MAX_FILE_SIZE = 1024 * 1024;

const inputSchema = z.object({
  path: z.string().min(1).describe('Path of the file, relative to the workspace'),
});

export interface ReadFileToolOptions {
  workspaceDir: string;
}

export function createReadFileTool(options: ReadFileToolOptions): ToolHandle {
  return defineLocalTool({
    name: 'read_file',
    description: 'Reads a UTF-8 text file from the shared workspace and returns its content.',
    inputSchema,

    async run(input, context) {
      const resolved = await confineToWorkspace('read_file', options.workspaceDir, input.path);
      if (!resolved.ok) return resolved;
      const { absolute, relative } = resolved.value;

      try {
        const info = await stat(absolute);
        if (!info.isFile()) {
          return err(new ToolExecutionError('read_file', `"${relative}" is not a file`));
        }
        if (info.size > MAX_FILE_SIZE) {
          return err(new ToolExecutionError('read_file', `File too large: ${info.size} bytes (max ${MAX_FILE_SIZE} bytes)`));
        }

        const content = await readFile(absolute, { encoding: 'utf-8', signal: context.signal });

        logger.info('File read', {
          component: 'read-file',
          taskId: context.taskId,
          agent: context.agentName,
          path: relative,
          sizeBytes: info.size,
        });

        return ok({ path: relative, content });
      } catch (error) {
        if (fsErrorCode(error) === 'ENOENT') {
          return err(new ToolExecutionError('read_file', `File not found: ${relative}`));
        }
        const message = error instanceof Error ? error.message : String(error);
        return err(new ToolExecutionError('read_file', message, error));
      }
    },
  });
}
