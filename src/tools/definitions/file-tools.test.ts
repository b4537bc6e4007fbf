import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, mkdir, readFile, rm, symlink, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createListFilesTool } from './list-files.js';
import { createReadFileTool } from './read-file.js';
import { createWriteFileTool } from './write-file.js';
import { confineToWorkspace, resolveInWorkspace } from './workspace.js';
import { createTestInvocationContext } from '@/testing/fixtures/context.js';

const context = createTestInvocationContext();

let workspaceDir: string;

beforeEach(async () => {
  workspaceDir = await mkdtemp(path.join(os.tmpdir(), 'conclave-ws-'));
});

afterEach(async () => {
  await rm(workspaceDir, { recursive: true, force: true });
});

describe('resolveInWorkspace', () => {
  it('resolves nested relative paths', () => {
    const result = resolveInWorkspace('read_file', '/ws', 'docs/./notes.md');
    expect(result).toEqual({ ok: true, value: { absolute: '/ws/docs/notes.md', relative: 'docs/notes.md' } });
  });

  it('maps the root to "."', () => {
    const result = resolveInWorkspace('list_files', '/ws', '.');
    expect(result.ok && result.value.relative).toBe('.');
  });

  it('rejects parent traversal', () => {
    const result = resolveInWorkspace('read_file', '/ws', 'docs/../../etc/passwd');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TOOL_VALIDATION_ERROR');
      expect(result.error.message).toBe(
        'Invalid arguments for tool "read_file": path "docs/../../etc/passwd" is outside the workspace',
      );
    }
  });

  it('rejects absolute paths outside the workspace', () => {
    expect(resolveInWorkspace('read_file', '/ws', '/etc/passwd').ok).toBe(false);
  });

  it('accepts names that merely start with two dots', () => {
    expect(resolveInWorkspace('read_file', '/ws', '..notes').ok).toBe(true);
  });
});

describe('confineToWorkspace', () => {
  let outsideDir: string;

  beforeEach(async () => {
    outsideDir = await mkdtemp(path.join(os.tmpdir(), 'conclave-outside-'));
    await writeFile(path.join(outsideDir, 'secret.txt'), 'outside');
  });

  afterEach(async () => {
    await rm(outsideDir, { recursive: true, force: true });
  });

  it('rejects a path through a symlink that leaves the workspace', async () => {
    await symlink(outsideDir, path.join(workspaceDir, 'escape'));

    const result = await confineToWorkspace('read_file', workspaceDir, 'escape/secret.txt');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Invalid arguments for tool "read_file": path "escape/secret.txt" is outside the workspace',
      );
    }
  });

  it('follows symlinks that stay inside the workspace', async () => {
    await mkdir(path.join(workspaceDir, 'docs'));
    await symlink(path.join(workspaceDir, 'docs'), path.join(workspaceDir, 'latest'));

    const result = await confineToWorkspace('read_file', workspaceDir, 'latest/notes.md');

    expect(result.ok && result.value.relative).toBe('latest/notes.md');
  });

  it('rejects a dangling symlink', async () => {
    await symlink(path.join(outsideDir, 'created.txt'), path.join(workspaceDir, 'dangling.txt'));

    const result = await confineToWorkspace('write_file', workspaceDir, 'dangling.txt');

    expect(!result.ok && result.error.code).toBe('TOOL_VALIDATION_ERROR');
  });

  it('accepts paths in a workspace that does not exist yet', async () => {
    const result = await confineToWorkspace('write_file', path.join(workspaceDir, 'fresh'), 'out/a.txt');
    expect(result.ok && result.value.relative).toBe('out/a.txt');
  });

  it('keeps the file tools inside the workspace', async () => {
    await symlink(outsideDir, path.join(workspaceDir, 'escape'));

    const read = await createReadFileTool({ workspaceDir }).invoke({ path: 'escape/secret.txt' }, context);
    const written = await createWriteFileTool({ workspaceDir }).invoke(
      { path: 'escape/planted.txt', content: 'x' },
      context,
    );
    const listed = await createListFilesTool({ workspaceDir }).invoke({ path: 'escape' }, context);

    expect([read, written, listed].map((r) => !r.ok && r.error.code)).toEqual([
      'TOOL_VALIDATION_ERROR',
      'TOOL_VALIDATION_ERROR',
      'TOOL_VALIDATION_ERROR',
    ]);
    await expect(access(path.join(outsideDir, 'planted.txt'))).rejects.toThrow();
  });
});

describe('write_file', () => {
  it('writes content and creates parent directories', async () => {
    const tool = createWriteFileTool({ workspaceDir });

    const result = await tool.invoke({ path: 'out/report.md', content: 'héllo' }, context);

    expect(result).toEqual({ ok: true, value: { path: 'out/report.md', bytesWritten: 6 } });
    expect(await readFile(path.join(workspaceDir, 'out/report.md'), 'utf-8')).toBe('héllo');
  });

  it('refuses to write outside the workspace', async () => {
    const tool = createWriteFileTool({ workspaceDir });

    const result = await tool.invoke({ path: '../escape.txt', content: 'x' }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('TOOL_VALIDATION_ERROR');
  });

  it('rejects missing content', async () => {
    const tool = createWriteFileTool({ workspaceDir });

    const result = await tool.invoke({ path: 'a.txt' }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Invalid arguments for tool "write_file": content: Required');
  });
});

describe('read_file', () => {
  it('returns file content', async () => {
    await writeFile(path.join(workspaceDir, 'notes.txt'), 'line one\nline two');
    const tool = createReadFileTool({ workspaceDir });

    const result = await tool.invoke({ path: 'notes.txt' }, context);

    expect(result).toEqual({ ok: true, value: { path: 'notes.txt', content: 'line one\nline two' } });
  });

  it('reports a missing file as an execution error', async () => {
    const tool = createReadFileTool({ workspaceDir });

    const result = await tool.invoke({ path: 'missing.txt' }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TOOL_EXECUTION_ERROR');
      expect(result.error.message).toBe('Tool "read_file" failed: File not found: missing.txt');
    }
  });

  it('refuses to read a directory', async () => {
    await mkdir(path.join(workspaceDir, 'sub'));
    const tool = createReadFileTool({ workspaceDir });

    const result = await tool.invoke({ path: 'sub' }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Tool "read_file" failed: "sub" is not a file');
  });
});

describe('list_files', () => {
  it('lists directories first, then files, each sorted by name', async () => {
    await mkdir(path.join(workspaceDir, 'src'));
    await writeFile(path.join(workspaceDir, 'b.txt'), '');
    await writeFile(path.join(workspaceDir, 'a.txt'), '');
    const tool = createListFilesTool({ workspaceDir });

    const result = await tool.invoke({}, context);

    expect(result).toEqual({
      ok: true,
      value: {
        path: '.',
        entries: [
          { name: 'src', type: 'directory' },
          { name: 'a.txt', type: 'file' },
          { name: 'b.txt', type: 'file' },
        ],
      },
    });
  });

  it('reports a missing directory', async () => {
    const tool = createListFilesTool({ workspaceDir });

    const result = await tool.invoke({ path: 'nope' }, context);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Tool "list_files" failed: Directory not found: nope');
  });
});
