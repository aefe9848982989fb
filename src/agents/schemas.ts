import { z } from 'zod';

export const PaperSummarySchema = z.object({
  authors: z.array(z.string()),
  title: z.string(),
  abstract: z.string(),
});

export type PaperSummary = z.infer<typeof PaperSummarySchema>;

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Not a valid calendar date');

export const DateRangeSchema = z.object({
  start_date: isoDate,
  end_date: isoDate,
});

export type DateRange = z.infer<typeof DateRangeSchema>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Models answer "unknown" with null; treat that as an omitted key. */
export function dropNullFields(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null));
}

/**
 * Schema for a single model response: every field optional, nulls dropped.
 */
export function partialResponseSchema<Shape extends z.ZodRawShape>(schema: z.ZodObject<Shape>) {
  return z.preprocess(dropNullFields, schema.partial());
}
