/**
 * CLI helpers: argument parsing and error handling.
 */

import { InvalidArgumentError } from 'commander';
import { parseIsoDate, parseWeekendDay } from '@todo-hotel/core';
import type { IsoDate, TaskId, WeekendDay } from '@todo-hotel/core';
import * as out from './output.js';

/** Commander argument parser for task ids */
export function parseTaskId(value: string): TaskId {
  const id = Number(value.trim());
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidArgumentError('Task id must be a positive integer.');
  }
  return id;
}

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  const n = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(n)) {
    throw new InvalidArgumentError('Must be an integer.');
  }
  return n;
}

export function parseDateOption(value: string): IsoDate {
  const date = parseIsoDate(value);
  if (date === null) {
    throw new InvalidArgumentError('Date must be in YYYY-MM-DD format.');
  }
  return date;
}

export function parseDayOption(value: string): WeekendDay {
  const day = parseWeekendDay(value);
  if (day === null) {
    throw new InvalidArgumentError('Day must be one of fri, sat, sun.');
  }
  return day;
}

/**
 * Run a command action, printing unexpected errors instead of a stack trace.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
