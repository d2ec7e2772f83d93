import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { sql } from 'drizzle-orm';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  /** yyyy-MM-dd */
  dueDate: text('due_date').notNull(),
  isDone: integer('is_done', { mode: 'boolean' }).notNull().default(false),
  /** Set when the task is checked, cleared when it is reopened */
  doneAt: text('done_at'),
  createdAt: text('created_at').notNull(),
  isRecurring: integer('is_recurring', { mode: 'boolean' }).notNull().default(false),
  displayOrder: integer('display_order').notNull().default(0),
}, (table) => [
  index('idx_tasks_due_date').on(table.dueDate),
  index('idx_tasks_done_created').on(table.isDone, table.createdAt),
  // Non-unique: a reopened task may sit beside an open copy
  index('idx_tasks_open_title_due').on(table.title, table.dueDate).where(sql`${table.isDone} = 0`),
]);
