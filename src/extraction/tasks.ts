import {
  DateRangeSchema,
  PaperSummarySchema,
  partialResponseSchema,
  type DateRange,
  type PaperSummary,
} from '../agents/schemas';
import { DATE_RANGE_PROMPT, PAPER_SUMMARY_PROMPT } from '../agents/prompts';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../agents/versions';
import { PromptTemplate } from './promptTemplate';
import type { ExtractionTask } from './types';

export const PAPER_SUMMARY_TASK: ExtractionTask<PaperSummary> = {
  name: 'PaperSummary',
  schema: PaperSummarySchema,
  responseSchema: partialResponseSchema(PaperSummarySchema),
  fields: [
    { name: 'authors', label: 'Authors', required: true },
    { name: 'title', label: 'Title', required: true },
    { name: 'abstract', label: 'Abstract', required: true },
  ],
  prompt: new PromptTemplate(PAPER_SUMMARY_PROMPT),
  version: { prompt: PROMPT_VERSIONS.paperSummary, schema: SCHEMA_VERSIONS.paperSummary },
};

/**
 * Reads publication metadata such as `{"year":2017,"month_range":"JAN-FEB"}`,
 * not document text, hence the small step and length floor.
 */
export const DATE_RANGE_TASK: ExtractionTask<DateRange> = {
  name: 'DateRange',
  schema: DateRangeSchema,
  responseSchema: partialResponseSchema(DateRangeSchema),
  fields: [
    { name: 'start_date', label: 'Start date', required: true },
    { name: 'end_date', label: 'End date', required: true },
  ],
  prompt: new PromptTemplate(DATE_RANGE_PROMPT),
  defaults: { chunkStep: 30, minTextLength: 1 },
  version: { prompt: PROMPT_VERSIONS.dateRange, schema: SCHEMA_VERSIONS.dateRange },
};
