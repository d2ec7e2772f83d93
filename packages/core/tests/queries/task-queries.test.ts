import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createTestDb, closeDb } from '../../src/db.js';
import { createStoreContext } from '../../src/context.js';
import type { StoreContext } from '../../src/context.js';
import { fixedClock } from '../../src/clock.js';
import type { ManualClock } from '../../src/clock.js';
import type { Logger } from '../../src/logger.js';
import type { Task } from '../../src/types/task.js';
import type { CreateResult, DataResult } from '../../src/types/results.js';
import {
  createIfAbsent,
  insertIfAbsent,
  getTaskById,
  getAllTasks,
  getTasksForDates,
  listTasks,
  getStats,
  toggleDone,
  renameTask,
  setDisplayOrder,
  deleteTask,
  clearAllTasks,
} from '../../src/queries/task-queries.js';

let clock: ManualClock;
let ctx: StoreContext;

beforeEach(() => {
  clock = fixedClock('2024-06-12T09:00:00.000Z');
  ctx = createStoreContext(createTestDb(), { clock });
});

function createdTask(result: CreateResult): Task {
  if (result.type !== 'created') throw new Error(`expected created, got ${result.type}`);
  return result.task;
}

function add(title: string, dueDate: string, extra: { is_recurring?: boolean; display_order?: number } = {}): Task {
  const task = createdTask(createIfAbsent(ctx, { title, due_date: dueDate, ...extra }));
  clock.advance(1000);
  return task;
}

function unwrap<T>(result: DataResult<T>): T {
  if (result.type !== 'success') throw new Error(`expected success, got ${result.type}`);
  return result.data;
}

const allTasks = () => unwrap(getAllTasks(ctx));
const tasksForDates = (dates: string[]) => unwrap(getTasksForDates(ctx, dates));
const stats = () => unwrap(getStats(ctx));

function titles(taskList: Task[]): string[] {
  return taskList.map(t => t.title);
}

describe('createIfAbsent', () => {
  it('creates an open task', () => {
    const result = createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-06-14' });
    expect(result.type).toBe('created');
    expect(result.message).toBe('Task "Clean lobby" created successfully');

    const task = createdTask(result);
    expect(task).toEqual({
      id: task.id,
      title: 'Clean lobby',
      dueDate: '2024-06-14',
      isDone: false,
      doneAt: null,
      createdAt: '2024-06-12T09:00:00.000Z',
      isRecurring: false,
      displayOrder: 0,
    });
    expect(getTaskById(ctx, task.id)).toEqual(task);
  });

  it('returns the existing task for an open duplicate', () => {
    const first = add('Clean lobby', '2024-06-14');
    const second = createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-06-14' });

    expect(second.type).toBe('already-exists');
    expect(second.message).toBe('Task "Clean lobby" already exists for 2024-06-14');
    expect(second.type === 'already-exists' && second.task.id).toBe(first.id);
    expect(allTasks()).toHaveLength(1);
  });

  it('matches duplicates after trimming the title', () => {
    const first = add('Clean lobby', '2024-06-14');
    const second = createIfAbsent(ctx, { title: '  Clean lobby ', due_date: '2024-06-14' });
    expect(second.type === 'already-exists' && second.task.id).toBe(first.id);
  });

  it('treats a different due date as a different task', () => {
    add('Clean lobby', '2024-06-14');
    const other = createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-06-15' });
    expect(other.type).toBe('created');
  });

  it('does not let a completed task block a new one', () => {
    const first = add('Clean lobby', '2024-06-14');
    toggleDone(ctx, first.id);

    const again = createTask('Clean lobby', '2024-06-14');
    expect(again.id).not.toBe(first.id);
    expect(allTasks()).toHaveLength(2);
  });

  it('counts the title length in characters, not UTF-16 units', () => {
    expect(createIfAbsent(ctx, { title: '🧹'.repeat(300), due_date: '2024-06-14' }).type).toBe('created');
  });

  it('rejects a display order beyond the safe integer range', () => {
    expect(createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-06-14', display_order: 1e20 })).toEqual({
      type: 'invalid',
      message: 'display_order is out of range',
    });
    expect(allTasks()).toEqual([]);
  });

  it('stores the recurring flag and display order', () => {
    const task = add('Water plants', '2024-06-15', { is_recurring: true, display_order: 2 });
    expect(task.isRecurring).toBe(true);
    expect(task.displayOrder).toBe(2);
  });

  it('rejects invalid input without writing', () => {
    const result = createIfAbsent(ctx, { title: '', due_date: '2024-06-14' });
    expect(result).toEqual({ type: 'invalid', message: 'Title cannot be empty' });
    expect(allTasks()).toHaveLength(0);
  });

  it('rejects an impossible due date', () => {
    const result = createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-13-40' });
    expect(result).toEqual({ type: 'invalid', message: 'due_date must be in YYYY-MM-DD format' });
  });

  it('reports a storage failure as an error result', () => {
    closeDb(ctx.db);
    const result = createIfAbsent(ctx, { title: 'Clean lobby', due_date: '2024-06-14' });
    expect(result).toEqual({
      type: 'error',
      message: 'Task creation failed, the task store is unavailable',
    });
  });

  function createTask(title: string, dueDate: string): Task {
    return createdTask(createIfAbsent(ctx, { title, due_date: dueDate }));
  }
});

describe('insertIfAbsent', () => {
  it('refuses an insert racing an open duplicate and returns the winner', () => {
    const warn = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
    const racing = createStoreContext(ctx.db, { clock, logger });

    const winner = add('Clean lobby', '2024-06-14');
    // A caller that passed the existence check before the winner committed
    const result = insertIfAbsent(racing, {
      title: 'Clean lobby', due_date: '2024-06-14', is_recurring: false, display_order: 0,
    });

    expect(result.type).toBe('already-exists');
    expect(result.type === 'already-exists' && result.task.id).toBe(winner.id);
    expect(allTasks()).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('Insert refused, open duplicate created concurrently', {
      id: winner.id, title: 'Clean lobby', due_date: '2024-06-14',
    });
  });

  it('inserts when no open duplicate exists', () => {
    const result = insertIfAbsent(ctx, {
      title: 'Fold towels', due_date: '2024-06-16', is_recurring: true, display_order: 1,
    });
    expect(result.type).toBe('created');
    expect(result.type === 'created' && result.task.isRecurring).toBe(true);
  });
});

describe('getAllTasks', () => {
  it('orders open before done, then display order, due date and newest first', () => {
    add('Saturday chore', '2024-06-15');
    const friday = add('Friday chore', '2024-06-14');
    add('Pinned', '2024-06-16', { display_order: -1 });
    add('Saturday newer', '2024-06-15');
    toggleDone(ctx, friday.id);

    expect(titles(allTasks())).toEqual([
      'Pinned',
      'Saturday newer',
      'Saturday chore',
      'Friday chore',
    ]);
  });
});

describe('getTasksForDates', () => {
  it('returns only tasks due on the given dates', () => {
    add('Friday chore', '2024-06-14');
    add('Saturday chore', '2024-06-15');
    add('Monday chore', '2024-06-17');

    expect(titles(tasksForDates(['2024-06-14', '2024-06-15']))).toEqual([
      'Friday chore',
      'Saturday chore',
    ]);
  });

  it('reports an unavailable store as an error result', () => {
    closeDb(ctx.db);
    expect(getTasksForDates(ctx, ['2024-06-14'])).toEqual({
      type: 'error',
      message: 'Task listing failed, the task store is unavailable',
    });
    expect(getAllTasks(ctx).type).toBe('error');
  });

  it('returns nothing for an empty date list', () => {
    add('Friday chore', '2024-06-14');
    expect(tasksForDates([])).toEqual([]);
  });
});

describe('listTasks', () => {
  beforeEach(() => {
    add('One', '2024-06-14');
    add('Two', '2024-06-15');
    add('Three', '2024-06-16');
    add('Four', '2024-06-21');
    const five = add('Five', '2024-06-22');
    toggleDone(ctx, five.id);
  });

  it('paginates with a total and hasMore', () => {
    const first = listTasks(ctx, { limit: 2 });
    expect(first.type).toBe('success');
    if (first.type !== 'success') return;
    expect(titles(first.data.tasks)).toEqual(['One', 'Two']);
    expect(first.data.pagination).toEqual({ total: 5, limit: 2, offset: 0, hasMore: true });
    expect(first.message).toBe('2 of 5 task(s)');

    const last = listTasks(ctx, { limit: 2, offset: 4 });
    if (last.type !== 'success') throw new Error(last.type);
    expect(titles(last.data.tasks)).toEqual(['Five']);
    expect(last.data.pagination.hasMore).toBe(false);
  });

  it('filters by due date range, inclusive', () => {
    const result = listTasks(ctx, { from: '2024-06-15', to: '2024-06-21' });
    if (result.type !== 'success') throw new Error(result.type);
    expect(titles(result.data.tasks)).toEqual(['Two', 'Three', 'Four']);
    expect(result.data.pagination.total).toBe(3);
  });

  it('filters by completion', () => {
    const done = listTasks(ctx, { is_done: true });
    if (done.type !== 'success') throw new Error(done.type);
    expect(titles(done.data.tasks)).toEqual(['Five']);

    const open = listTasks(ctx, { is_done: false });
    if (open.type !== 'success') throw new Error(open.type);
    expect(open.data.pagination.total).toBe(4);
  });

  it('rejects an out-of-range limit', () => {
    expect(listTasks(ctx, { limit: 0 })).toEqual({
      type: 'invalid',
      message: 'limit must be between 1 and 1000',
    });
  });

  it('rejects an offset beyond the safe integer range', () => {
    expect(listTasks(ctx, { offset: 1e20 })).toEqual({
      type: 'invalid',
      message: 'offset is out of range',
    });
  });

  it('reports an unavailable store as an error result and logs it', () => {
    const error = vi.fn();
    const logged = createStoreContext(ctx.db, { clock, logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error } });
    closeDb(ctx.db);

    expect(listTasks(logged, {})).toEqual({
      type: 'error',
      message: 'Task listing failed, the task store is unavailable',
    });
    expect(error).toHaveBeenCalledOnce();
    expect(error.mock.calls[0]?.[0]).toBe('Task listing failed');
  });
});

describe('getStats', () => {
  it('counts open, done and recurring tasks', () => {
    expect(stats()).toEqual({ total: 0, open: 0, done: 0, recurring: 0 });

    const lobby = add('Clean lobby', '2024-06-14');
    add('Water plants', '2024-06-15', { is_recurring: true });
    add('Fold towels', '2024-06-16');
    toggleDone(ctx, lobby.id);

    expect(stats()).toEqual({ total: 3, open: 2, done: 1, recurring: 1 });
  });

  it('reports an unavailable store as an error result', () => {
    closeDb(ctx.db);
    expect(getStats(ctx)).toEqual({
      type: 'error',
      message: 'Task statistics failed, the task store is unavailable',
    });
  });
});

describe('toggleDone', () => {
  it('completes and reopens a task', () => {
    const task = add('Clean lobby', '2024-06-14');
    clock.set('2024-06-14T18:45:00.000Z');

    const done = toggleDone(ctx, task.id);
    expect(done.type).toBe('success');
    if (done.type !== 'success') return;
    expect(done.data.isDone).toBe(true);
    expect(done.data.doneAt).toBe('2024-06-14T18:45:00.000Z');
    expect(done.message).toBe('Task "Clean lobby" completed');

    const reopened = toggleDone(ctx, task.id);
    if (reopened.type !== 'success') throw new Error(reopened.type);
    expect(reopened.data.isDone).toBe(false);
    expect(reopened.data.doneAt).toBeNull();
    expect(reopened.message).toBe('Task "Clean lobby" reopened');
    expect(getTaskById(ctx, task.id)).toEqual(reopened.data);
  });

  it('reports an unknown id', () => {
    expect(toggleDone(ctx, 999)).toEqual({ type: 'not-found', taskId: 999 });
  });

  it('reopens a completed task even when an open copy exists', () => {
    const first = add('Clean lobby', '2024-06-14');
    toggleDone(ctx, first.id);
    add('Clean lobby', '2024-06-14');

    const reopened = toggleDone(ctx, first.id);
    expect(reopened.type).toBe('success');
    expect(allTasks().filter(t => !t.isDone)).toHaveLength(2);
  });
});

describe('renameTask', () => {
  it('renames and reports both titles', () => {
    const task = add('Clean lobby', '2024-06-14');
    const result = renameTask(ctx, task.id, '  Clean lobby windows ');
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(result.data.title).toBe('Clean lobby windows');
    expect(result.message).toBe('Task updated from "Clean lobby" to "Clean lobby windows"');
  });

  it('may produce two open tasks with the same title and date', () => {
    add('Clean lobby', '2024-06-14');
    const other = add('Fold towels', '2024-06-14');

    expect(renameTask(ctx, other.id, 'Clean lobby').type).toBe('success');
    expect(titles(tasksForDates(['2024-06-14']))).toEqual(['Clean lobby', 'Clean lobby']);
  });

  it('rejects an empty title', () => {
    const task = add('Clean lobby', '2024-06-14');
    expect(renameTask(ctx, task.id, '   ')).toEqual({ type: 'invalid', message: 'Title cannot be empty' });
    expect(getTaskById(ctx, task.id)?.title).toBe('Clean lobby');
  });

  it('reports an unknown id', () => {
    expect(renameTask(ctx, 42, 'Anything')).toEqual({ type: 'not-found', taskId: 42 });
  });
});

describe('setDisplayOrder', () => {
  it('moves a task ahead of its date peers', () => {
    add('First', '2024-06-14');
    const second = add('Second', '2024-06-14');

    const result = setDisplayOrder(ctx, second.id, -1);
    expect(result.type === 'success' && result.message).toBe('Task "Second" moved to position -1');
    expect(titles(allTasks())).toEqual(['Second', 'First']);
  });

  it('rejects a fractional position', () => {
    const task = add('First', '2024-06-14');
    expect(setDisplayOrder(ctx, task.id, 0.5)).toEqual({
      type: 'invalid',
      message: 'display_order must be an integer',
    });
  });

  it('reports an unknown id', () => {
    expect(setDisplayOrder(ctx, 7, 1)).toEqual({ type: 'not-found', taskId: 7 });
  });
});

describe('deleteTask', () => {
  it('deletes once, then reports not-found', () => {
    const task = add('Clean lobby', '2024-06-14');

    const first = deleteTask(ctx, task.id);
    expect(first.type === 'success' && first.message).toBe('Task "Clean lobby" deleted');
    expect(getTaskById(ctx, task.id)).toBeNull();

    expect(deleteTask(ctx, task.id)).toEqual({ type: 'not-found', taskId: task.id });
  });
});

describe('clearAllTasks', () => {
  beforeEach(() => {
    for (let i = 1; i <= 7; i++) add(`Chore ${i}`, '2024-06-14');
  });

  it('counts and samples without deleting on a dry run', () => {
    const summary = clearAllTasks(ctx, { dryRun: true });
    expect(summary.total).toBe(7);
    expect(summary.deleted).toBe(0);
    expect(summary.dryRun).toBe(true);
    expect(titles(summary.sample)).toEqual(['Chore 7', 'Chore 6', 'Chore 5', 'Chore 4', 'Chore 3']);
    expect(allTasks()).toHaveLength(7);
  });

  it('deletes everything when confirmed', () => {
    const summary = clearAllTasks(ctx, { dryRun: false });
    expect(summary.total).toBe(7);
    expect(summary.deleted).toBe(7);
    expect(summary.dryRun).toBe(false);
    expect(allTasks()).toEqual([]);
  });

  it('is a no-op on an empty store', () => {
    clearAllTasks(ctx, { dryRun: false });
    expect(clearAllTasks(ctx, { dryRun: false })).toEqual({ total: 0, deleted: 0, dryRun: false, sample: [] });
  });
});
