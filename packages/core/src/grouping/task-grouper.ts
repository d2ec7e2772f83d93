/**
 * Display buckets over a task sequence: the target weekend, every task by
 * week, and completed tasks by the day they were checked. Pure functions;
 * callers fetch the tasks (in store order) and pass them in.
 */

import type { IsoDate } from '../calendar/calendar-date.js';
import { addDays, isoDateInTimeZone } from '../calendar/calendar-date.js';
import type { Weekend } from '../calendar/weekend.js';
import { weekendStart } from '../calendar/weekend.js';
import type { Task } from '../types/task.js';

export interface WeekendBuckets {
  readonly friday: Task[];
  readonly saturday: Task[];
  readonly sunday: Task[];
}

export interface WeekGroup extends WeekendBuckets {
  readonly weekend: Weekend;
}

export interface CompletedGroup {
  readonly date: IsoDate;
  readonly tasks: Task[];
}

function emptyBuckets(): { friday: Task[]; saturday: Task[]; sunday: Task[] } {
  return { friday: [], saturday: [], sunday: [] };
}

/** Split the tasks due on one weekend by day. Input order is kept within each day. */
export function groupByWeekend(taskList: readonly Task[], weekend: Weekend): WeekendBuckets {
  const buckets = emptyBuckets();
  for (const task of taskList) {
    if (task.dueDate === weekend.friday) buckets.friday.push(task);
    else if (task.dueDate === weekend.saturday) buckets.saturday.push(task);
    else if (task.dueDate === weekend.sunday) buckets.sunday.push(task);
  }
  return buckets;
}

/**
 * Group every task under the weekend its due date files into, most recent
 * (or furthest in the future) first. Weekday tasks open their week's group but
 * land in none of its day lists.
 */
export function groupByWeek(taskList: readonly Task[]): WeekGroup[] {
  const weeks = new Map<IsoDate, { weekend: Weekend; friday: Task[]; saturday: Task[]; sunday: Task[] }>();

  for (const task of taskList) {
    const friday = weekendStart(task.dueDate);
    let week = weeks.get(friday);
    if (!week) {
      week = {
        weekend: { friday, saturday: addDays(friday, 1), sunday: addDays(friday, 2) },
        ...emptyBuckets(),
      };
      weeks.set(friday, week);
    }

    if (task.dueDate === week.weekend.friday) week.friday.push(task);
    else if (task.dueDate === week.weekend.saturday) week.saturday.push(task);
    else if (task.dueDate === week.weekend.sunday) week.sunday.push(task);
  }

  return [...weeks.values()].sort((a, b) => (a.weekend.friday < b.weekend.friday ? 1 : -1));
}

/**
 * Completed tasks grouped by the calendar day of done_at in `timeZone`
 * (process local zone when omitted). Newest day first; within a day,
 * by display_order, then latest completion first.
 */
export function groupByCompletionDate(
  taskList: readonly Task[],
  opts: { timeZone?: string } = {},
): CompletedGroup[] {
  const completed = taskList
    .flatMap(task => (task.isDone && task.doneAt !== null ? [{ task, doneAt: task.doneAt }] : []))
    .sort((a, b) => {
      if (a.task.displayOrder !== b.task.displayOrder) return a.task.displayOrder - b.task.displayOrder;
      return Date.parse(b.doneAt) - Date.parse(a.doneAt);
    });

  const groups = new Map<IsoDate, Task[]>();
  for (const { task, doneAt } of completed) {
    const date = isoDateInTimeZone(new Date(doneAt), opts.timeZone);
    const bucket = groups.get(date);
    if (bucket) bucket.push(task);
    else groups.set(date, [task]);
  }

  return [...groups.entries()]
    .map(([date, tasks]) => ({ date, tasks }))
    .sort((a, b) => (a.date < b.date ? 1 : -1));
}
