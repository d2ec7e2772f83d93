import { Command } from 'commander';
import type { StoreContext, TaskId } from '@todo-hotel/core';
import { setDisplayOrder } from '@todo-hotel/core';
import * as out from '../output.js';
import { parseInteger, parseTaskId, $try } from '../helpers.js';

export function createOrderCommand(ctx: StoreContext): Command {
  return new Command('order')
    .description('Set the display order of a task among tasks due the same day')
    .argument('<taskId>', 'The id of the task', parseTaskId)
    .argument('<position>', 'Lower comes first', parseInteger)
    .action((taskId: TaskId, position: number) => $try(() => {
      out.printResult(setDisplayOrder(ctx, taskId, position));
    }));
}
