import { Command } from 'commander';
import type { StoreContext, TaskId } from '@todo-hotel/core';
import { toggleDone } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createCheckCommand(ctx: StoreContext): Command {
  return new Command('check')
    .description('Mark a task done, or reopen it if it already is')
    .argument('<taskId>', 'The id of the task', parseTaskId)
    .action((taskId: TaskId) => $try(() => {
      out.printResult(toggleDone(ctx, taskId));
    }));
}
