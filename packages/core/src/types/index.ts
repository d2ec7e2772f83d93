export type { TaskId, Task, TaskJson } from './task.js';
export type { DataResult, CreateResult, Failure } from './results.js';
