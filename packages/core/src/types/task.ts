import type { IsoDate } from '../calendar/calendar-date.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly dueDate: IsoDate;
  readonly isDone: boolean;
  readonly doneAt: string | null; // ISO string, UTC
  readonly createdAt: string; // ISO string, UTC
  readonly isRecurring: boolean;
  readonly displayOrder: number;
}

/** Wire shape of a task wherever it leaves the process (JSON output, seeder payloads) */
export interface TaskJson {
  id: TaskId;
  title: string;
  due_date: IsoDate;
  is_done: boolean;
  done_at: string | null;
  created_at: string;
  is_recurring: boolean;
  display_order: number;
}
