/**
 * The three read-only display modes: the target weekend, every task by week,
 * and completed tasks by completion day.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { IsoDate, StoreContext } from '@todo-hotel/core';
import {
  getAllTasks, getTasksForDates, groupByWeekend, groupByWeek, groupByCompletionDate,
  localIsoDate, targetWeekend,
} from '@todo-hotel/core';
import * as out from '../output.js';
import { parseDateOption, $try } from '../helpers.js';

export function createWeekendCommand(ctx: StoreContext): Command {
  return new Command('weekend')
    .description('Show the tasks of the target weekend')
    .option('--date <date>', 'Reference date instead of today (YYYY-MM-DD)', parseDateOption)
    .action((opts: { date?: IsoDate }) => $try(() => {
      const weekend = targetWeekend(opts.date ?? localIsoDate(ctx.clock.now()));
      const result = getTasksForDates(ctx, [weekend.friday, weekend.saturday, weekend.sunday]);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }

      const days = groupByWeekend(result.data, weekend);

      out.printDay(weekend.friday, days.friday);
      out.printDay(weekend.saturday, days.saturday);
      out.printDay(weekend.sunday, days.sunday);
    }));
}

export function createWeeksCommand(ctx: StoreContext): Command {
  return new Command('weeks')
    .description('Show every task grouped by weekend, latest first')
    .action(() => $try(() => {
      const result = getAllTasks(ctx);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }

      const weeks = groupByWeek(result.data);
      if (weeks.length === 0) {
        out.info('No tasks found');
        return;
      }

      for (const week of weeks) {
        console.log(chalk.bold(`Week-end du ${out.formatFrenchDate(week.weekend.friday)}`));
        out.printDay(week.weekend.friday, week.friday);
        out.printDay(week.weekend.saturday, week.saturday);
        out.printDay(week.weekend.sunday, week.sunday);
        console.log();
      }
    }));
}

export function createCompletedCommand(ctx: StoreContext, opts: { timeZone?: string }): Command {
  return new Command('completed')
    .description('Show completed tasks grouped by the day they were checked')
    .action(() => $try(() => {
      const result = getAllTasks(ctx);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }

      const groups = groupByCompletionDate(result.data, { timeZone: opts.timeZone });
      if (groups.length === 0) {
        out.info('No completed tasks');
        return;
      }

      for (const group of groups) {
        out.printDay(group.date, group.tasks);
      }
    }));
}
