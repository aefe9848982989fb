export const PROMPT_VERSIONS = {
  paperSummary: 'v1',
  dateRange: 'v1',
} as const;

export const SCHEMA_VERSIONS = {
  paperSummary: 'v1',
  dateRange: 'v1',
} as const;
