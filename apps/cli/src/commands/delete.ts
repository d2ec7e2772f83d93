import { Command } from 'commander';
import type { StoreContext, TaskId } from '@todo-hotel/core';
import { deleteTask, clearAllTasks } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createDeleteCommand(ctx: StoreContext): Command {
  return new Command('delete')
    .description('Delete a task permanently')
    .argument('<taskId>', 'The id of the task', parseTaskId)
    .action((taskId: TaskId) => $try(() => {
      out.printResult(deleteTask(ctx, taskId));
    }));
}

export function createClearCommand(ctx: StoreContext): Command {
  return new Command('clear')
    .description('Delete every task')
    .option('--dry-run', 'Only show what would be deleted')
    .option('--confirm', 'Really delete every task')
    .action((opts: { dryRun?: boolean; confirm?: boolean }) => $try(() => {
      if (!opts.dryRun && !opts.confirm) {
        out.warning('This deletes every task. Pass --confirm to proceed, or --dry-run to preview.');
        process.exitCode = 1;
        return;
      }

      const summary = clearAllTasks(ctx, { dryRun: opts.dryRun ?? false });
      if (summary.total === 0) {
        out.info('No tasks to delete');
        return;
      }

      if (summary.dryRun) {
        out.info(`Would delete ${summary.total} task(s), for example:`);
        for (const task of summary.sample) {
          console.log(out.formatTaskLine(task, { showDue: true }));
        }
        return;
      }

      out.success(`Deleted ${summary.deleted} task(s)`);
    }));
}
