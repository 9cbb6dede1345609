import { z } from 'zod';
import { isIsoDate } from './dates.js';
import { ValidationError, type FieldErrors } from './errors.js';
import { MAX_TAG_LENGTH } from './tags.js';
import { CATEGORIES } from './types.js';

export function zodErrorToFieldErrors(err: z.ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of err.issues) {
    const path = issue.path.join('.') || '_';
    if (!fieldErrors[path]) fieldErrors[path] = [];
    fieldErrors[path].push(issue.message);
  }
  return fieldErrors;
}

/** Parse or throw a ValidationError carrying per-field messages */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(message, zodErrorToFieldErrors(result.error));
  }
  return result.data;
}

// --- Common schemas ---
export const isoDate = z.string().refine(isIsoDate, 'Invalid date, expected YYYY-MM-DD');
/** $1,000,000,000.00; keeps sums far inside SQLite's 64-bit integers */
export const MAX_AMOUNT_MINOR = 1_000_000_000_00;
const amountCap = `must be at most ${MAX_AMOUNT_MINOR} cents`;

const cents = z
  .number()
  .int('must be whole cents')
  .nonnegative('must not be negative')
  .max(MAX_AMOUNT_MINOR, amountCap);

export const categorySchema = z.enum(CATEGORIES);

// --- Expenses ---
export const expenseInputSchema = z.object({
  itemName: z.string().trim().min(1, 'item name required'),
  amountMinor: z
    .number()
    .int('must be whole cents')
    .positive('amount must be > 0')
    .max(MAX_AMOUNT_MINOR, amountCap),
  category: categorySchema,
  occurredOn: isoDate,
  tags: z.array(z.string().trim().max(MAX_TAG_LENGTH, `tags are at most ${MAX_TAG_LENGTH} characters`)).default([]),
});

export const dateRangeSchema = z
  .object({
    start: isoDate.optional(),
    end: isoDate.optional(),
  })
  .refine((r) => !r.start || !r.end || r.start <= r.end, {
    message: 'start must not be after end',
    path: ['end'],
  });

// --- Settings ---
export const settingsInputSchema = z.object({
  income1Minor: cents,
  income2Minor: cents,
  savingGoalPct: z.number().min(0, 'goal must be 0–100').max(100, 'goal must be 0–100'),
  budgetFunMinor: cents,
  budgetGroceriesMinor: cents,
  budgetTravelMinor: cents,
  budgetHomeMinor: cents,
  budgetMiscMinor: cents,
});

export const allocationDraftSchema = settingsInputSchema.omit({ budgetMiscMinor: true });

export const RESET_TOKEN = 'RESET';

export const MAX_LIMIT = 100_000;
export const limitSchema = z.number().int().positive().max(MAX_LIMIT);
