import type { Clock } from '../clock.js';
import type { IsoDate } from './calendar-date.js';
import { addDays, isoWeekday, localIsoDate } from './calendar-date.js';

const FRIDAY = 4;

export interface Weekend {
  readonly friday: IsoDate;
  readonly saturday: IsoDate;
  readonly sunday: IsoDate;
}

export type WeekendDay = 'fri' | 'sat' | 'sun';

/**
 * The Friday–Sunday window a date-entry defaults to.
 * Friday, Saturday and Sunday target the weekend they are part of;
 * Monday to Thursday target the coming one.
 */
export function targetWeekend(referenceDate: IsoDate): Weekend {
  // Back 0-2 days from Fri/Sat/Sun, forward 1-4 days from Mon-Thu
  const friday = addDays(referenceDate, FRIDAY - isoWeekday(referenceDate));
  return {
    friday,
    saturday: addDays(friday, 1),
    sunday: addDays(friday, 2),
  };
}

/** Target weekend for "today" as the clock sees it, in local time */
export function targetWeekendFor(clock: Clock): Weekend {
  return targetWeekend(localIsoDate(clock.now()));
}

/** The Friday that opens the weekend a due date is filed under */
export function weekendStart(date: IsoDate): IsoDate {
  return targetWeekend(date).friday;
}

export function weekendDay(weekend: Weekend, day: WeekendDay): IsoDate {
  switch (day) {
    case 'fri': return weekend.friday;
    case 'sat': return weekend.saturday;
    case 'sun': return weekend.sunday;
  }
}

export function parseWeekendDay(input: string): WeekendDay | null {
  switch (input.trim().toLowerCase()) {
    case 'fri': case 'friday': case 'vendredi': return 'fri';
    case 'sat': case 'saturday': case 'samedi': return 'sat';
    case 'sun': case 'sunday': case 'dimanche': return 'sun';
    default: return null;
  }
}
