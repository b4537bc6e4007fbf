import { describe, it, expect } from 'vitest';
import { createTask, isTerminalStatus, transitionTaskStatus } from './task.js';
import { TaskStateError } from './errors.js';

describe('createTask', () => {
  it('creates a pending task with a prefixed id', () => {
    const createdAt = new Date('2025-01-01T00:00:00Z');
    const task = createTask('write hello.txt', 'research', createdAt);

    expect(task.status).toBe('pending');
    expect(task.id.startsWith('task_')).toBe(true);
    expect(task.teamName).toBe('research');
    expect(task.createdAt).toBe(createdAt);
  });

  it('generates unique ids', () => {
    expect(createTask('a', 't').id).not.toBe(createTask('a', 't').id);
  });
});

describe('transitionTaskStatus', () => {
  const { id } = createTask('x', 't');

  it.each([
    ['pending', 'running'],
    ['pending', 'failed'],
    ['running', 'completed'],
    ['running', 'failed'],
  ] as const)('allows %s -> %s', (from, to) => {
    const result = transitionTaskStatus(id, from, to);
    expect(result.ok).toBe(true);
  });

  it.each([
    ['completed', 'running'],
    ['completed', 'pending'],
    ['failed', 'running'],
    ['failed', 'completed'],
    ['running', 'pending'],
    ['pending', 'completed'],
  ] as const)('rejects %s -> %s', (from, to) => {
    const result = transitionTaskStatus(id, from, to);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TaskStateError);
      expect(result.error.code).toBe('INVALID_TASK_TRANSITION');
    }
  });

  it('identifies terminal statuses', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('running')).toBe(false);
  });
});
