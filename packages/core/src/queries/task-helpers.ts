import type { Task, TaskJson } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';

/** Map a Drizzle row to a Task object */
export function toTask(row: typeof tasks.$inferSelect): Task {
  return { ...row };
}

export function toTaskJson(task: Task): TaskJson {
  return {
    id: task.id,
    title: task.title,
    due_date: task.dueDate,
    is_done: task.isDone,
    done_at: task.doneAt,
    created_at: task.createdAt,
    is_recurring: task.isRecurring,
    display_order: task.displayOrder,
  };
}

/** Return a copy of the task with is_done flipped and done_at set or cleared */
export function withToggledDone(task: Task, now: Date): Task {
  const isDone = !task.isDone;
  return {
    ...task,
    isDone,
    doneAt: isDone ? now.toISOString() : null,
  };
}

/** Status label for messages */
export function doneLabel(task: Task): string {
  return task.isDone ? 'completed' : 'reopened';
}
