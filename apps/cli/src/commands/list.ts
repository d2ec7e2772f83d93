import { Command } from 'commander';
import chalk from 'chalk';
import type { ListQuery, StoreContext } from '@todo-hotel/core';
import { listTasks, toTaskJson } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseInteger, $try } from '../helpers.js';

interface ListOptions {
  from?: string;
  to?: string;
  done?: boolean;
  open?: boolean;
  limit?: number;
  offset?: number;
  json?: boolean;
}

export function createListCommand(ctx: StoreContext): Command {
  return new Command('list')
    .description('List tasks, open first')
    .option('--from <date>', 'Earliest due date (YYYY-MM-DD)')
    .option('--to <date>', 'Latest due date (YYYY-MM-DD)')
    .option('--done', 'Show only completed tasks')
    .option('--open', 'Show only open tasks')
    .option('-n, --limit <n>', 'Page size (1-1000)', parseInteger)
    .option('--offset <n>', 'Number of tasks to skip', parseInteger)
    .option('--json', 'Print the page as JSON')
    .action((opts: ListOptions) => $try(() => {
      if (opts.done && opts.open) {
        out.error('Cannot use both --done and --open at the same time');
        process.exitCode = 1;
        return;
      }

      const query: ListQuery = {
        from: opts.from,
        to: opts.to,
        is_done: opts.done ? true : opts.open ? false : undefined,
        limit: opts.limit,
        offset: opts.offset,
      };

      const result = listTasks(ctx, query);
      if (result.type !== 'success') {
        out.printResult(result);
        return;
      }

      const { tasks, pagination } = result.data;
      if (opts.json) {
        console.log(JSON.stringify({ tasks: tasks.map(toTaskJson), pagination }, null, 2));
        return;
      }

      if (tasks.length === 0) {
        out.info('No tasks found');
        return;
      }
      for (const task of tasks) {
        console.log(out.formatTaskLine(task, { showDue: true }));
      }
      const footer = pagination.hasMore
        ? `${result.message}, next page: --offset ${pagination.offset + pagination.limit}`
        : result.message;
      console.log(chalk.dim(footer));
    }));
}
