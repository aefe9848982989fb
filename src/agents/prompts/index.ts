export { PAPER_SUMMARY_PROMPT } from './paperSummary';
export { DATE_RANGE_PROMPT } from './dateRange';
