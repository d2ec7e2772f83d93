/**
 * Calendar dates as yyyy-MM-dd strings.
 * Arithmetic runs on UTC midnights so a DST switch never moves a date.
 */

export type IsoDate = string;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/** Format the UTC date part of a Date as yyyy-MM-dd */
export function toIsoDate(d: Date): IsoDate {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

/** Format the local date part of a Date as yyyy-MM-dd */
export function localIsoDate(d: Date): IsoDate {
  return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/**
 * Parse a strict yyyy-MM-dd string (surrounding whitespace allowed).
 * Returns null for malformed input and for dates that do not exist, e.g. 2024-02-30.
 */
export function parseIsoDate(input: string): IsoDate | null {
  const trimmed = input.trim();
  const m = ISO_DATE_RE.exec(trimmed);
  if (!m) return null;

  const d = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  // Date.UTC rolls 2024-13-40 over into 2025; the round trip catches it
  return toIsoDate(d) === trimmed ? trimmed : null;
}

function toUtcMidnight(date: IsoDate): Date {
  const m = ISO_DATE_RE.exec(date);
  if (!m) throw new RangeError(`Not a calendar date: ${date}`);
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

export function addDays(date: IsoDate, n: number): IsoDate {
  return toIsoDate(new Date(toUtcMidnight(date).getTime() + n * MS_PER_DAY));
}

/** Day of week with Monday = 0 … Sunday = 6 */
export function isoWeekday(date: IsoDate): number {
  return (toUtcMidnight(date).getUTCDay() + 6) % 7;
}

/**
 * The calendar date an instant falls on in a time zone.
 * Without a zone, the process's local zone is used.
 */
export function isoDateInTimeZone(instant: Date, timeZone?: string): IsoDate {
  if (timeZone === undefined) return localIsoDate(instant);

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/** True if the string names a time zone this runtime knows */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err: unknown) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}
