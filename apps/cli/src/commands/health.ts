import { Command } from 'commander';
import type { StoreContext } from '@todo-hotel/core';
import { checkHealth, getStats } from '@todo-hotel/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createHealthCommand(ctx: StoreContext): Command {
  return new Command('health')
    .description('Check that the task store answers')
    .option('--json', 'Print the report as JSON')
    .action((opts: { json?: boolean }) => $try(() => {
      const report = checkHealth(ctx);
      if (report.status === 'unhealthy') process.exitCode = 1;

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      if (report.status === 'unhealthy') {
        out.error(`unhealthy: database ${report.database} (${report.error})`);
        return;
      }

      out.success(`healthy: database ${report.database}, version ${report.version}`);
      const stats = getStats(ctx);
      if (stats.type !== 'success') {
        out.printResult(stats);
        return;
      }
      const { total, open, done, recurring } = stats.data;
      out.info(`${total} task(s): ${open} open, ${done} done, ${recurring} recurring`);
    }));
}
