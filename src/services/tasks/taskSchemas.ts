import { z } from 'zod';
import { TASK_STATUSES } from '../../types/task';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 1000;

// Date, optionally followed by a time and a UTC offset. A missing offset means UTC.
const ISO_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const HAS_OFFSET_PATTERN = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalizes an ISO-8601 date or datetime to `Date#toISOString()` form.
 * Returns null when the value is not a real calendar date.
 */
export function normalizeDateTime(value: string): string | null {
  if (!ISO_DATETIME_PATTERN.test(value) || !isCalendarDate(value.slice(0, 10))) {
    return null;
  }
  let candidate = value.replace(' ', 'T');
  if (ISO_DATE_PATTERN.test(candidate)) {
    candidate += 'T00:00:00';
  }
  if (!HAS_OFFSET_PATTERN.test(candidate)) {
    candidate += 'Z';
  }
  const parsed = new Date(candidate);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  return parsed.toISOString();
}

// Rejects rollovers such as 2030-02-31.
function isCalendarDate(date: string): boolean {
  const [year, month, day] = date.split('-').map(Number);
  const utc = new Date(Date.UTC(year, month - 1, day));
  return utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day;
}

const dueDateSchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = normalizeDateTime(value);
    if (!normalized) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid datetime' });
      return z.NEVER;
    }
    if (Date.parse(normalized) < Date.now()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Due date cannot be in the past' });
      return z.NEVER;
    }
    return normalized;
  });

const calendarDateSchema = z
  .string()
  .regex(ISO_DATE_PATTERN, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => normalizeDateTime(value) !== null, { message: 'Invalid date' });

const titleSchema = z.string().min(1).max(TITLE_MAX_LENGTH);
const descriptionSchema = z.string().max(DESCRIPTION_MAX_LENGTH).nullable();
const statusSchema = z.enum(TASK_STATUSES);

export const createTaskSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.optional(),
  due_date: dueDateSchema.nullable().optional(),
  status: statusSchema.default('pending'),
});

export const updateTaskSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  due_date: dueDateSchema.nullable().optional(),
  status: statusSchema.optional(),
});

export const taskListQuerySchema = z.object({
  status: statusSchema.optional(),
  due_date_from: calendarDateSchema.optional(),
  due_date_to: calendarDateSchema.optional(),
  sort_by: z.enum(['creation_date', 'due_date']).default('creation_date'),
  sort_order: z.enum(['asc', 'desc']).default('desc'),
});

export const taskIdSchema = z
  .string()
  .regex(/^-?\d+$/, 'Task id must be an integer')
  .transform((value) => Number(value));

export const taskParamsSchema = z.object({
  taskId: taskIdSchema,
});

export type CreateTaskInput = z.infer<typeof createTaskSchema>;
export type UpdateTaskInput = z.infer<typeof updateTaskSchema>;
export type TaskListQueryInput = z.infer<typeof taskListQuerySchema>;
