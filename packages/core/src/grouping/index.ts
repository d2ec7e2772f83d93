export { groupByWeekend, groupByWeek, groupByCompletionDate } from './task-grouper.js';
export type { WeekendBuckets, WeekGroup, CompletedGroup } from './task-grouper.js';
