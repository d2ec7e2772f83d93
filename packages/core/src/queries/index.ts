// Task helpers
export {
  toTask,
  toTaskJson,
  withToggledDone,
  doneLabel,
} from './task-helpers.js';

// Task queries
export {
  getTaskById,
  findOpenTask,
  getAllTasks,
  getTasksForDates,
  listTasks,
  getStats,
  insertIfAbsent,
  createIfAbsent,
  toggleDone,
  renameTask,
  setDisplayOrder,
  deleteTask,
  clearAllTasks,
} from './task-queries.js';
export type { Pagination, TaskPage, ClearSummary, TaskStats } from './task-queries.js';

// Health
export { checkHealth, APP_VERSION } from './health-queries.js';
export type { HealthReport } from './health-queries.js';
