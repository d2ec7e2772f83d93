/**
 * Task store: idempotent creation, filtered listing, and the per-task mutations.
 * Every operation takes a StoreContext and returns a typed result; expected
 * conditions (bad input, unknown id, duplicate) never throw.
 */

import { eq, and, asc, desc, gte, lte, inArray, count, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { StoreContext } from '../context.js';
import { getRawDb } from '../db.js';
import { describeError } from '../logger.js';
import type { LogFields } from '../logger.js';
import type { IsoDate } from '../calendar/calendar-date.js';
import type { Task, TaskId } from '../types/task.js';
import type { CreateResult, DataResult, Failure } from '../types/results.js';
import { tasks } from '../schema/tasks.js';
import { toTask, withToggledDone, doneLabel } from './task-helpers.js';
import {
  validateCreateTaskInput, validateListQuery, validateTitle, validateDisplayOrder,
} from '../validation/task-input.js';
import type { CreateTaskInput, CreateTaskValues, ListQuery } from '../validation/task-input.js';

/** Open tasks first, then display_order, due date, newest first; id breaks exact ties */
const DEFAULT_ORDER: SQL[] = [
  asc(tasks.isDone),
  asc(tasks.displayOrder),
  asc(tasks.dueDate),
  desc(tasks.createdAt),
  desc(tasks.id),
];

const CLEAR_SAMPLE_SIZE = 5;

export interface Pagination {
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
  readonly hasMore: boolean;
}

export interface TaskPage {
  readonly tasks: Task[];
  readonly pagination: Pagination;
}

export interface ClearSummary {
  readonly total: number;
  readonly deleted: number;
  readonly dryRun: boolean;
  readonly sample: Task[];
}

export interface TaskStats {
  readonly total: number;
  readonly open: number;
  readonly done: number;
  readonly recurring: number;
}

function storageFailure(ctx: StoreContext, action: string, err: unknown, fields: LogFields = {}): Extract<Failure, { type: 'error' }> {
  const detail = describeError(err);
  ctx.logger.error(`${action} failed`, { ...fields, error: detail.message, code: detail.code });
  return { type: 'error', message: `${action} failed, the task store is unavailable` };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Single-row lookup. Throws on storage failure; callers run it inside their own try. */
export function getTaskById(ctx: StoreContext, taskId: TaskId): Task | null {
  const row = ctx.db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** The open task holding a (title, due date) pair, if any */
export function findOpenTask(ctx: StoreContext, title: string, dueDate: IsoDate): Task | null {
  const row = ctx.db.select().from(tasks).where(and(
    eq(tasks.title, title),
    eq(tasks.dueDate, dueDate),
    eq(tasks.isDone, false),
  )).orderBy(asc(tasks.id)).get();
  return row ? toTask(row) : null;
}

/** Every task in display order */
export function getAllTasks(ctx: StoreContext): DataResult<Task[]> {
  try {
    const rows = ctx.db.select().from(tasks).orderBy(...DEFAULT_ORDER).all();
    return { type: 'success', data: rows.map(toTask), message: `${rows.length} task(s)` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task listing', err);
  }
}

/** Tasks due on any of the given dates, in display order */
export function getTasksForDates(ctx: StoreContext, dates: readonly IsoDate[]): DataResult<Task[]> {
  if (dates.length === 0) return { type: 'success', data: [], message: '0 task(s)' };

  try {
    const rows = ctx.db.select().from(tasks)
      .where(inArray(tasks.dueDate, [...dates]))
      .orderBy(...DEFAULT_ORDER)
      .all();
    return { type: 'success', data: rows.map(toTask), message: `${rows.length} task(s)` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task listing', err, { dates: [...dates] });
  }
}

/** Filtered, paginated listing with the total match count */
export function listTasks(ctx: StoreContext, query: ListQuery = {}): DataResult<TaskPage> {
  const validation = validateListQuery(query);
  if (!validation.ok) return { type: 'invalid', message: validation.message };
  const q = validation.value;

  const conditions: SQL[] = [];
  if (q.from !== undefined) conditions.push(gte(tasks.dueDate, q.from));
  if (q.to !== undefined) conditions.push(lte(tasks.dueDate, q.to));
  if (q.is_done !== undefined) conditions.push(eq(tasks.isDone, q.is_done));
  const where = conditions.length > 0 ? and(...conditions) : undefined;

  try {
    const total = ctx.db.select({ total: count() }).from(tasks).where(where).get()?.total ?? 0;
    const rows = ctx.db.select().from(tasks)
      .where(where)
      .orderBy(...DEFAULT_ORDER)
      .limit(q.limit)
      .offset(q.offset)
      .all();

    ctx.logger.debug('Listed tasks', { ...q, total, returned: rows.length });

    return {
      type: 'success',
      data: {
        tasks: rows.map(toTask),
        pagination: {
          total,
          limit: q.limit,
          offset: q.offset,
          hasMore: q.offset + q.limit < total,
        },
      },
      message: `${rows.length} of ${total} task(s)`,
    };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task listing', err, { ...q });
  }
}

export function getStats(ctx: StoreContext): DataResult<TaskStats> {
  try {
    const row = ctx.db.select({
      total: count(),
      done: sql<number>`COALESCE(SUM(${tasks.isDone}), 0)`,
      recurring: sql<number>`COALESCE(SUM(${tasks.isRecurring}), 0)`,
    }).from(tasks).get();

    const total = row?.total ?? 0;
    const done = Number(row?.done ?? 0);
    const stats: TaskStats = {
      total,
      open: total - done,
      done,
      recurring: Number(row?.recurring ?? 0),
    };
    return { type: 'success', data: stats, message: `${total} task(s)` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task statistics', err);
  }
}

// ---------------------------------------------------------------------------
// Creation
// ---------------------------------------------------------------------------

/**
 * Insert unless an open task already holds (title, due date), as one statement.
 * SQLite runs it under its write lock, so of two racing callers exactly one
 * inserts; the other gets zero changes and is handed the winner's row.
 */
export function insertIfAbsent(ctx: StoreContext, values: CreateTaskValues): CreateResult {
  const createdAt = ctx.clock.now().toISOString();

  const result = ctx.db.run(sql`
    INSERT INTO tasks (title, due_date, is_done, done_at, created_at, is_recurring, display_order)
    SELECT ${values.title}, ${values.due_date}, 0, NULL, ${createdAt}, ${values.is_recurring ? 1 : 0}, ${values.display_order}
    WHERE NOT EXISTS (
      SELECT 1 FROM tasks WHERE title = ${values.title} AND due_date = ${values.due_date} AND is_done = 0
    )
  `);

  if (result.changes === 0) {
    const winner = findOpenTask(ctx, values.title, values.due_date);
    if (!winner) {
      // The competing row was closed or removed between the two statements
      return { type: 'error', message: `Task "${values.title}" was refused as a duplicate but no open copy remains` };
    }
    ctx.logger.warn('Insert refused, open duplicate created concurrently', {
      id: winner.id, title: values.title, due_date: values.due_date,
    });
    return { type: 'already-exists', task: winner, message: `Task "${winner.title}" already exists for ${winner.dueDate}` };
  }

  const task = getTaskById(ctx, Number(result.lastInsertRowid));
  if (!task) {
    return { type: 'error', message: `Task "${values.title}" was inserted but could not be read back` };
  }
  ctx.logger.info('Task created', { id: task.id, title: task.title, due_date: task.dueDate });
  return { type: 'created', task, message: `Task "${task.title}" created successfully` };
}

/**
 * Create a task unless an open one with the same title and due date exists.
 * A duplicate is a successful no-op tagged `already-exists`, never an error.
 */
export function createIfAbsent(ctx: StoreContext, input: CreateTaskInput): CreateResult {
  const validation = validateCreateTaskInput(input);
  if (!validation.ok) {
    ctx.logger.warn('Task creation rejected', { reason: validation.message });
    return { type: 'invalid', message: validation.message };
  }
  const values = validation.value;

  try {
    const existing = findOpenTask(ctx, values.title, values.due_date);
    if (existing) {
      ctx.logger.info('Task already exists', { id: existing.id, title: values.title, due_date: values.due_date });
      return { type: 'already-exists', task: existing, message: `Task "${existing.title}" already exists for ${existing.dueDate}` };
    }
    return insertIfAbsent(ctx, values);
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task creation', err, { title: values.title, due_date: values.due_date });
  }
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

/** Flip completion; done_at follows is_done */
export function toggleDone(ctx: StoreContext, taskId: TaskId): DataResult<Task> {
  try {
    const raw = getRawDb(ctx.db);
    const run = raw.transaction((): Task | null => {
      const task = getTaskById(ctx, taskId);
      if (!task) return null;

      const updated = withToggledDone(task, ctx.clock.now());
      ctx.db.update(tasks)
        .set({ isDone: updated.isDone, doneAt: updated.doneAt })
        .where(eq(tasks.id, taskId))
        .run();
      return updated;
    });

    const updated = run();
    if (!updated) return { type: 'not-found', taskId };

    ctx.logger.info(`Task ${doneLabel(updated)}`, { id: taskId, done_at: updated.doneAt });
    return { type: 'success', data: updated, message: `Task "${updated.title}" ${doneLabel(updated)}` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task toggle', err, { id: taskId });
  }
}

/**
 * Change a task's title. The open-duplicate rule is not re-checked here,
 * so a rename may leave two open tasks with the same title and date.
 */
export function renameTask(ctx: StoreContext, taskId: TaskId, newTitle: string): DataResult<Task> {
  const validation = validateTitle(newTitle);
  if (!validation.ok) return { type: 'invalid', message: validation.message };
  const title = validation.value;

  try {
    const old = getTaskById(ctx, taskId);
    if (!old) return { type: 'not-found', taskId };

    const row = ctx.db.update(tasks).set({ title }).where(eq(tasks.id, taskId)).returning().get();
    if (!row) return { type: 'not-found', taskId };

    ctx.logger.info('Task renamed', { id: taskId, from: old.title, to: title });
    return { type: 'success', data: toTask(row), message: `Task updated from "${old.title}" to "${title}"` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task rename', err, { id: taskId });
  }
}

/** Set the manual tie-breaker used among tasks sharing a due date */
export function setDisplayOrder(ctx: StoreContext, taskId: TaskId, order: number): DataResult<Task> {
  const validation = validateDisplayOrder(order);
  if (!validation.ok) return { type: 'invalid', message: validation.message };

  try {
    const row = ctx.db.update(tasks)
      .set({ displayOrder: validation.value })
      .where(eq(tasks.id, taskId))
      .returning()
      .get();
    if (!row) return { type: 'not-found', taskId };

    ctx.logger.info('Task reordered', { id: taskId, display_order: validation.value });
    return { type: 'success', data: toTask(row), message: `Task "${row.title}" moved to position ${validation.value}` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task reorder', err, { id: taskId });
  }
}

/** Delete a task permanently. Deleting an id twice reports not-found the second time. */
export function deleteTask(ctx: StoreContext, taskId: TaskId): DataResult<Task> {
  try {
    const row = ctx.db.delete(tasks).where(eq(tasks.id, taskId)).returning().get();
    if (!row) return { type: 'not-found', taskId };

    ctx.logger.info('Task deleted', { id: taskId, title: row.title });
    return { type: 'success', data: toTask(row), message: `Task "${row.title}" deleted` };
  } catch (err: unknown) {
    return storageFailure(ctx, 'Task delete', err, { id: taskId });
  }
}

/**
 * Delete every task in one transaction. A dry run only counts and samples.
 * Failures roll back and propagate: this is an operator action, not a contract call.
 */
export function clearAllTasks(ctx: StoreContext, opts: { dryRun: boolean }): ClearSummary {
  const raw = getRawDb(ctx.db);
  const run = raw.transaction((): ClearSummary => {
    const total = ctx.db.select({ total: count() }).from(tasks).get()?.total ?? 0;
    const sample = ctx.db.select().from(tasks)
      .orderBy(...DEFAULT_ORDER)
      .limit(CLEAR_SAMPLE_SIZE)
      .all()
      .map(toTask);

    if (opts.dryRun || total === 0) {
      return { total, deleted: 0, dryRun: opts.dryRun, sample };
    }

    const deleted = ctx.db.delete(tasks).run().changes;
    return { total, deleted, dryRun: false, sample };
  });

  const summary = run();
  if (summary.dryRun) {
    ctx.logger.info('Clear simulated', { total: summary.total });
  } else {
    ctx.logger.warn('All tasks deleted', { deleted: summary.deleted });
  }
  return summary;
}
