/**
 * write_file: creates or replaces a file inside the workspace.
 * Parent directories are created as needed.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError, ToolValidationError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { defineLocalTool } from '../define-tool.js';
import type { ToolHandle } from '../types.js';
import { confineToWorkspace } from './workspace.js';

const logger = createLogger({ name: 'write-file' });

const inputSchema = z.object({
  path: z.string().min(1).describe('Path of the file, relative to the workspace'),
  content: z.string().describe('Full text content to write'),
});

export interface WriteFileToolOptions {
  workspaceDir: string;
}

export function createWriteFileTool(options: WriteFileToolOptions): ToolHandle {
  return defineLocalTool({
    name: 'write_file',
    description: 'Writes text content to a file in the shared workspace, replacing any existing file.',
    inputSchema,

    async run(input, context) {
      const resolved = await confineToWorkspace('write_file', options.workspaceDir, input.path);
      if (!resolved.ok) return resolved;
      const { absolute, relative } = resolved.value;
      if (relative === '.') {
        return err(new ToolValidationError('write_file', 'path must name a file'));
      }

      try {
        await mkdir(path.dirname(absolute), { recursive: true });
        await writeFile(absolute, input.content, { encoding: 'utf-8', signal: context.signal });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return err(new ToolExecutionError('write_file', message, error));
      }

      const bytesWritten = Buffer.byteLength(input.content, 'utf-8');
      logger.info('File written', {
        component: 'write-file',
        taskId: context.taskId,
        agent: context.agentName,
        path: relative,
        bytesWritten,
      });

      return ok({ path: relative, bytesWritten });
    },
  });
}
