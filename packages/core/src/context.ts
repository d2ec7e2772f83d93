import type { TodoDb } from './db.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

/** Everything a store operation needs, passed explicitly instead of read from globals */
export interface StoreContext {
  readonly db: TodoDb;
  readonly clock: Clock;
  readonly logger: Logger;
}

export function createStoreContext(
  db: TodoDb,
  opts: { clock?: Clock; logger?: Logger } = {},
): StoreContext {
  return {
    db,
    clock: opts.clock ?? systemClock,
    logger: opts.logger ?? silentLogger,
  };
}
