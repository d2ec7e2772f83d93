import type { Task, TaskId } from './task.js';

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

/** Outcome of the idempotent creation contract. Both `created` and `already-exists` are successes. */
export type CreateResult =
  | { readonly type: 'created'; readonly task: Task; readonly message: string }
  | { readonly type: 'already-exists'; readonly task: Task; readonly message: string }
  | { readonly type: 'invalid'; readonly message: string }
  | { readonly type: 'error'; readonly message: string };

export type Failure = Extract<DataResult<never>, { type: 'not-found' | 'invalid' | 'error' }>;
