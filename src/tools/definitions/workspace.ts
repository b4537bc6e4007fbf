import { lstat, realpath } from 'node:fs/promises';
import path from 'node:path';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { ToolExecutionError, ToolValidationError } from '@/core/errors.js';

export interface WorkspacePath {
  absolute: string;
  /** Forward slashes; "." for the root. */
  relative: string;
}

/** errno code of a failed fs call, if any. */
export function fsErrorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function isWithin(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return !(relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative));
}

function outside(toolName: string, requested: string): ToolValidationError {
  return new ToolValidationError(toolName, `path "${requested}" is outside the workspace`, { path: requested });
}

/**
 * Resolve `requested` against the workspace root.
 * Absolute paths and `..` segments that leave the workspace are rejected.
 */
export function resolveInWorkspace(
  toolName: string,
  workspaceDir: string,
  requested: string,
): Result<WorkspacePath, ToolValidationError> {
  const root = path.resolve(workspaceDir);
  const absolute = path.resolve(root, requested);
  if (!isWithin(root, absolute)) return err(outside(toolName, requested));

  const relative = path.relative(root, absolute);
  return ok({ absolute, relative: relative === '' ? '.' : relative.split(path.sep).join('/') });
}

// ─── On-disk Check ──────────────────────────────────────────────

async function isSymlink(target: string): Promise<boolean> {
  try {
    return (await lstat(target)).isSymbolicLink();
  } catch (error) {
    const code = fsErrorCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') return false;
    throw error;
  }
}

/**
 * `target` with every symlink in its existing part resolved and the missing
 * rest appended. `null` when a component is a dangling symlink.
 */
async function realPathOf(target: string): Promise<string | null> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    try {
      return path.join(await realpath(current), ...missing);
    } catch (error) {
      const code = fsErrorCode(error);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') throw error;
      if (await isSymlink(current)) return null;
      const parent = path.dirname(current);
      if (parent === current) throw error;
      missing.unshift(path.basename(current));
      current = parent;
    }
  }
}

/**
 * `resolveInWorkspace`, then the same check on the real path, so a symlink
 * inside the workspace cannot lead a tool outside it.
 */
export async function confineToWorkspace(
  toolName: string,
  workspaceDir: string,
  requested: string,
): Promise<Result<WorkspacePath, ToolValidationError | ToolExecutionError>> {
  const resolved = resolveInWorkspace(toolName, workspaceDir, requested);
  if (!resolved.ok) return resolved;

  try {
    const root = await realPathOf(path.resolve(workspaceDir));
    const target = await realPathOf(resolved.value.absolute);
    if (root === null || target === null || !isWithin(root, target)) {
      return err(outside(toolName, requested));
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ToolExecutionError(toolName, message, error));
  }
  return resolved;
}
