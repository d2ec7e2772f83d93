/**
 * Input contracts for task creation and listing. Both accept the external
 * snake_case shape so JSON payloads and CLI options go through the same checks.
 */

import { z } from 'zod';
import { parseIsoDate } from '../calendar/calendar-date.js';

export const TITLE_MAX_LENGTH = 500;
export const LIST_LIMIT_MIN = 1;
export const LIST_LIMIT_MAX = 1000;
export const LIST_LIMIT_DEFAULT = 100;

function isoDateField(field: string) {
  const formatMessage = `${field} must be in YYYY-MM-DD format`;
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: formatMessage })
    .transform((value, ctx) => {
      const date = parseIsoDate(value);
      if (date === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: formatMessage });
        return z.NEVER;
      }
      return date;
    });
}

export const titleSchema = z
  .string({ required_error: 'Title is required and cannot be empty', invalid_type_error: 'Title must be a string' })
  .trim()
  .min(1, 'Title cannot be empty')
  // Counted in code points, so an emoji is one character
  .refine(title => [...title].length <= TITLE_MAX_LENGTH, `Title cannot exceed ${TITLE_MAX_LENGTH} characters`);

export const createTaskInputSchema = z.object({
  title: titleSchema,
  due_date: isoDateField('due_date'),
  is_recurring: z.boolean({ invalid_type_error: 'is_recurring must be a boolean' }).default(false),
  display_order: z
    .number({ invalid_type_error: 'display_order must be an integer' })
    .int('display_order must be an integer')
    .safe('display_order is out of range')
    .default(0),
});

export const listQuerySchema = z.object({
  from: isoDateField('from').optional(),
  to: isoDateField('to').optional(),
  is_done: z.boolean({ invalid_type_error: 'is_done must be true or false' }).optional(),
  limit: z
    .number({ invalid_type_error: 'limit must be an integer' })
    .int('limit must be an integer')
    .min(LIST_LIMIT_MIN, `limit must be between ${LIST_LIMIT_MIN} and ${LIST_LIMIT_MAX}`)
    .max(LIST_LIMIT_MAX, `limit must be between ${LIST_LIMIT_MIN} and ${LIST_LIMIT_MAX}`)
    .default(LIST_LIMIT_DEFAULT),
  offset: z
    .number({ invalid_type_error: 'offset must be an integer' })
    .int('offset must be an integer')
    .min(0, 'offset must be 0 or greater')
    .safe('offset is out of range')
    .default(0),
});

export const displayOrderSchema = z
  .number({ invalid_type_error: 'display_order must be an integer' })
  .int('display_order must be an integer')
  .safe('display_order is out of range');

export type CreateTaskInput = z.input<typeof createTaskInputSchema>;
export type CreateTaskValues = z.output<typeof createTaskInputSchema>;
export type ListQuery = z.input<typeof listQuerySchema>;
export type ListQueryValues = z.output<typeof listQuerySchema>;

export type Validation<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly message: string };

function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): Validation<z.output<S>> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return { ok: true, value: parsed.data };
  return { ok: false, message: parsed.error.issues[0]?.message ?? 'Invalid input' };
}

export function validateCreateTaskInput(data: unknown): Validation<CreateTaskValues> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { ok: false, message: 'JSON payload is required' };
  }
  return validate(createTaskInputSchema, data);
}

export function validateListQuery(data: unknown): Validation<ListQueryValues> {
  return validate(listQuerySchema, data ?? {});
}

export function validateTitle(title: unknown): Validation<string> {
  return validate(titleSchema, title);
}

export function validateDisplayOrder(order: unknown): Validation<number> {
  return validate(displayOrderSchema, order);
}
