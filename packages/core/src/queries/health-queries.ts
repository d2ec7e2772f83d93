import { sql } from 'drizzle-orm';
import type { StoreContext } from '../context.js';
import { describeError } from '../logger.js';

export const APP_VERSION = '1.0.0';

export type HealthReport =
  | { readonly status: 'healthy'; readonly version: string; readonly database: 'connected' }
  | { readonly status: 'unhealthy'; readonly version: string; readonly database: 'disconnected'; readonly error: string };

/** Liveness check: one round trip to the store */
export function checkHealth(ctx: StoreContext): HealthReport {
  try {
    ctx.db.get(sql`SELECT 1`);
    ctx.logger.debug('Health check passed');
    return { status: 'healthy', version: APP_VERSION, database: 'connected' };
  } catch (err: unknown) {
    const detail = describeError(err);
    ctx.logger.error('Health check failed', { error: detail.message, code: detail.code });
    return { status: 'unhealthy', version: APP_VERSION, database: 'disconnected', error: detail.message };
  }
}
