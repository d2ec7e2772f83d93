export {
  toIsoDate,
  localIsoDate,
  parseIsoDate,
  addDays,
  isoWeekday,
  isoDateInTimeZone,
  isValidTimeZone,
} from './calendar-date.js';
export type { IsoDate } from './calendar-date.js';
export {
  targetWeekend,
  targetWeekendFor,
  weekendStart,
  weekendDay,
  parseWeekendDay,
} from './weekend.js';
export type { Weekend, WeekendDay } from './weekend.js';
