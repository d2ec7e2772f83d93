export {
  createTaskInputSchema,
  listQuerySchema,
  titleSchema,
  validateCreateTaskInput,
  validateListQuery,
  validateTitle,
  validateDisplayOrder,
  TITLE_MAX_LENGTH,
  LIST_LIMIT_MIN,
  LIST_LIMIT_MAX,
  LIST_LIMIT_DEFAULT,
} from './task-input.js';
export type {
  CreateTaskInput,
  CreateTaskValues,
  ListQuery,
  ListQueryValues,
  Validation,
} from './task-input.js';
