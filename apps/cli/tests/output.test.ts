import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import type { Task } from '@todo-hotel/core';
import {
  formatFrenchDate,
  formatTaskLine,
  printResult,
  printCreateResult,
} from '../src/output.js';

const lobby: Task = {
  id: 3,
  title: 'Clean lobby',
  dueDate: '2024-06-14',
  isDone: false,
  doneAt: null,
  createdAt: '2024-06-12T09:00:00.000Z',
  isRecurring: false,
  displayOrder: 0,
};

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('formatFrenchDate', () => {
  it('writes the long French date', () => {
    expect(formatFrenchDate('2024-06-14')).toBe('vendredi 14 juin 2024');
    expect(formatFrenchDate('2024-12-01')).toBe('dimanche 1 décembre 2024');
  });
});

describe('formatTaskLine', () => {
  it('shows id, checkbox and title', () => {
    expect(formatTaskLine(lobby)).toBe('   3 [ ] Clean lobby');
  });

  it('marks done and recurring tasks and can show the due date', () => {
    const task: Task = { ...lobby, isDone: true, doneAt: '2024-06-14T10:00:00.000Z', isRecurring: true };
    expect(formatTaskLine(task, { showDue: true })).toBe('   3 [x] Clean lobby (recurring)  2024-06-14');
  });
});

describe('printResult', () => {
  it('prints success without touching the exit code', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'success', data: lobby, message: 'Task "Clean lobby" completed' });
    expect(spy).toHaveBeenCalledWith('Task "Clean lobby" completed');
    expect(process.exitCode).toBeUndefined();
  });

  it('prints not-found and fails', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'not-found', taskId: 9 });
    expect(spy).toHaveBeenCalledWith('Could not find task with id 9');
    expect(process.exitCode).toBe(1);
  });

  it('prints invalid input and fails', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'invalid', message: 'Title cannot be empty' });
    expect(spy).toHaveBeenCalledWith('Title cannot be empty');
    expect(process.exitCode).toBe(1);
  });
});

describe('printCreateResult', () => {
  it('treats an existing task as success', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printCreateResult({
      type: 'already-exists',
      task: lobby,
      message: 'Task "Clean lobby" already exists for 2024-06-14',
    });
    expect(spy).toHaveBeenCalledWith('Task "Clean lobby" already exists for 2024-06-14 (id 3)');
    expect(process.exitCode).toBeUndefined();
  });

  it('fails on a storage error', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    printCreateResult({ type: 'error', message: 'Task creation failed' });
    expect(process.exitCode).toBe(1);
  });
});
