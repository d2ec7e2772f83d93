/**
 * chalk-based output formatting.
 */

import chalk from 'chalk';
import type { CreateResult, DataResult, IsoDate, Task } from '@todo-hotel/core';

// --- Formatting functions ---

/** Long French date, e.g. "vendredi 14 juin 2024" */
export function formatFrenchDate(date: IsoDate): string {
  return new Date(`${date}T00:00:00.000Z`).toLocaleDateString('fr-FR', {
    weekday: 'long',
    day: 'numeric',
    month: 'long',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

export function formatCheckbox(isDone: boolean): string {
  return isDone ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatTaskLine(task: Task, opts: { showDue?: boolean } = {}): string {
  const title = task.isDone ? chalk.dim.strikethrough(task.title) : task.title;
  const recurring = task.isRecurring ? chalk.cyan(' (recurring)') : '';
  const due = opts.showDue ? chalk.dim(`  ${task.dueDate}`) : '';
  return `${chalk.dim(`${String(task.id).padStart(4)}`)} ${formatCheckbox(task.isDone)} ${title}${recurring}${due}`;
}

export function printDay(date: IsoDate, taskList: readonly Task[]): void {
  console.log(chalk.bold.underline(formatFrenchDate(date)));
  if (taskList.length === 0) {
    console.log(chalk.dim('  Nothing planned'));
  }
  for (const task of taskList) {
    console.log(formatTaskLine(task));
  }
}

// --- Result output ---

export function printResult(result: DataResult<unknown>): void {
  switch (result.type) {
    case 'success': success(result.message); break;
    case 'not-found': error(`Could not find task with id ${result.taskId}`); break;
    case 'invalid': error(result.message); break;
    case 'error': error(result.message); break;
  }
  if (result.type !== 'success') process.exitCode = 1;
}

/** Both outcomes of an idempotent create are successes */
export function printCreateResult(result: CreateResult): void {
  switch (result.type) {
    case 'created':
      success(`${result.message} (id ${result.task.id}, ${formatFrenchDate(result.task.dueDate)})`);
      break;
    case 'already-exists':
      info(`${result.message} (id ${result.task.id})`);
      break;
    case 'invalid':
    case 'error':
      error(result.message);
      process.exitCode = 1;
      break;
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}
