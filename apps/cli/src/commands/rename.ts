import { Command } from 'commander';
import type { StoreContext, TaskId } from '@todo-hotel/core';
import { renameTask } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseTaskId, $try } from '../helpers.js';

export function createRenameCommand(ctx: StoreContext): Command {
  return new Command('rename')
    .description('Rename a task')
    .argument('<taskId>', 'The id of the task', parseTaskId)
    .argument('<title>', 'The new title')
    .action((taskId: TaskId, title: string) => $try(() => {
      out.printResult(renameTask(ctx, taskId, title));
    }));
}
