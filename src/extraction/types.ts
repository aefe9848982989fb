import type { z } from 'zod';
import type { ExtractionOptions } from '../agents/config';
import type { PromptTemplate } from './promptTemplate';

export type FieldName<T> = Extract<keyof T, string>;

export interface FieldSpec<K extends string = string> {
  name: K;
  /** Shown to the model in the "fields to extract" list. */
  label: string;
  /** Unset required fields keep the loop going and fail finalization. */
  required: boolean;
}

/** What to extract: the record schema, its fields and the prompt. */
export interface ExtractionTask<T extends Record<string, unknown>> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Validates one model response; every field optional. */
  responseSchema: z.ZodType<Partial<T>, z.ZodTypeDef, unknown>;
  fields: ReadonlyArray<FieldSpec<FieldName<T>>>;
  prompt: PromptTemplate;
  defaults?: Partial<ExtractionOptions>;
  version?: { prompt: string; schema: string };
}

interface ExtractionStats {
  attempts: number;
  failedAttempts: number;
  wordsSent: number;
  totalWords: number;
  truncated: boolean;
  durationMs: number;
}

export type ExtractionResult<T> =
  | ({ complete: true; data: T } & ExtractionStats)
  | ({ complete: false; data: Partial<T>; missingFields: string[] } & ExtractionStats);
