/**
 * Environment-driven configuration. Every value has a default, so an empty
 * environment yields a working setup.
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { isValidTimeZone } from './calendar/calendar-date.js';

export interface TodoHotelConfig {
  readonly dbPath: string;
  readonly logLevel: LogLevel;
  /** IANA zone for grouping completion dates; undefined = process local zone */
  readonly timeZone: string | undefined;
}

const DB_FILE_NAME = 'todo-hotel.db';
const APP_DIR_NAME = 'todo-hotel';

const envSchema = z.object({
  TODO_HOTEL_DB: z.string().trim().min(1).optional(),
  TODO_HOTEL_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: `must be one of ${LOG_LEVELS.join(', ')}` }),
    }))
    .default('info'),
  TODO_HOTEL_TIME_ZONE: z
    .string()
    .trim()
    .min(1)
    .refine(isValidTimeZone, { message: 'must be an IANA time zone, e.g. Europe/Paris' })
    .optional(),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', APP_DIR_NAME);
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR_NAME);
  } else {
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR_NAME);
  }

  return join(dir, DB_FILE_NAME);
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): TodoHotelConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }

  return {
    dbPath: parsed.data.TODO_HOTEL_DB ?? getDefaultDbPath(env, platform),
    logLevel: parsed.data.TODO_HOTEL_LOG_LEVEL,
    timeZone: parsed.data.TODO_HOTEL_TIME_ZONE,
  };
}
