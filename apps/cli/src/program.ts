import { Command } from 'commander';
import { APP_VERSION } from '@todo-hotel/core';
import type { StoreContext } from '@todo-hotel/core';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createWeekendCommand, createWeeksCommand, createCompletedCommand } from './commands/views.js';
import { createCheckCommand } from './commands/check.js';
import { createRenameCommand } from './commands/rename.js';
import { createOrderCommand } from './commands/order.js';
import { createDeleteCommand, createClearCommand } from './commands/delete.js';
import { createHealthCommand } from './commands/health.js';

export function createProgram(ctx: StoreContext, opts: { timeZone?: string } = {}): Command {
  const program = new Command()
    .name('todo-hotel')
    .description('Weekend task planner')
    .version(APP_VERSION);

  program.addCommand(createAddCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createWeekendCommand(ctx), { isDefault: true });
  program.addCommand(createWeeksCommand(ctx));
  program.addCommand(createCompletedCommand(ctx, opts));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createRenameCommand(ctx));
  program.addCommand(createOrderCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createClearCommand(ctx));
  program.addCommand(createHealthCommand(ctx));

  return program;
}
