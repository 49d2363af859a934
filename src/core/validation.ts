/**
 * Input validation schemas using Zod
 */

import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { MAX_PRIORITY_VALUE, MIN_PRIORITY_VALUE } from '../utils/priority.js';

export const PriorityValueSchema = z
  .number()
  .int()
  .min(MIN_PRIORITY_VALUE)
  .max(MAX_PRIORITY_VALUE);

export const CreateReminderInputSchema = z.object({
  title: z.string(),
  calendarId: z.string().min(1).optional(),
  dueDate: z.date().nullable().optional(),
  notes: z.string().nullable().optional(),
  url: z.string().url().nullable().optional(),
  priority: PriorityValueSchema.optional(),
  completed: z.boolean().optional(),
  flagged: z.boolean().optional(),
});

export const UpdateReminderInputSchema = CreateReminderInputSchema.omit({ calendarId: true }).partial();

export const ReminderFilterSchema = z.object({
  dueAfter: z.date().optional(),
  dueBefore: z.date().optional(),
  completed: z.boolean().optional(),
  priority: PriorityValueSchema.optional(),
  calendarId: z.string().optional(),
});

export const ReferenceTimeSchema = z.date();

export type ValidatedCreateReminderInput = z.infer<typeof CreateReminderInputSchema>;
export type ValidatedUpdateReminderInput = z.infer<typeof UpdateReminderInputSchema>;

/**
 * Parse input against a schema, throwing ValidationError on failure
 * @param what - Name of the input for the error message
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

  throw new ValidationError(`Invalid ${what}: ${issues}`, result.error.issues);
}
