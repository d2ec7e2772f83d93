import { Command } from 'commander';
import type { IsoDate, StoreContext, WeekendDay } from '@todo-hotel/core';
import { createIfAbsent, targetWeekendFor, weekendDay } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseDateOption, parseDayOption, parseInteger, $try } from '../helpers.js';

interface AddOptions {
  due?: IsoDate;
  day?: WeekendDay;
  recurring?: boolean;
  order?: number;
}

export function createAddCommand(ctx: StoreContext): Command {
  return new Command('add')
    .description('Add a task unless an open one with the same title and date exists')
    .argument('<title>', 'Task title')
    .option('-d, --due <date>', 'Due date (YYYY-MM-DD)', parseDateOption)
    .option('--day <day>', 'Day of the target weekend: fri, sat or sun (default fri)', parseDayOption)
    .option('-r, --recurring', 'Mark the task as recurring')
    .option('-o, --order <n>', 'Display order among tasks of the same day', parseInteger)
    .action((title: string, opts: AddOptions) => $try(() => {
      if (opts.due !== undefined && opts.day !== undefined) {
        out.error('Use either --due or --day, not both');
        process.exitCode = 1;
        return;
      }

      const dueDate = opts.due ?? weekendDay(targetWeekendFor(ctx.clock), opts.day ?? 'fri');
      const result = createIfAbsent(ctx, {
        title,
        due_date: dueDate,
        is_recurring: opts.recurring ?? false,
        display_order: opts.order ?? 0,
      });
      out.printCreateResult(result);
    }));
}
