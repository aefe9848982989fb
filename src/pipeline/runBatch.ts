import { EXTRACTION_CONFIG } from '../agents/config';
import { IncompleteExtractionError, PreconditionError } from '../agents/errors';
import type { ContentExtractor } from '../extraction/extractor';
import { DATE_RANGE_TASK, PAPER_SUMMARY_TASK } from '../extraction/tasks';
import type { ExtractionResult } from '../extraction/types';
import type { DocumentInfo } from '../ingest/documents';
import type { TextSource } from '../utils/documentParser';
import type { JsonlLog } from '../utils/jsonlLog';
import { Limiter } from '../utils/limiter';
import { createLogger, describeError, type Logger } from '../utils/logger';
import type { BatchSummary, DocumentOutcome, FailureKind, SuccessRecord } from './types';

export interface BatchDependencies {
  extractor: ContentExtractor;
  textSource: TextSource;
  successLog: JsonlLog<SuccessRecord>;
  failureLog: JsonlLog<DocumentInfo>;
  logger?: Logger;
}

export interface BatchOptions {
  /** Documents processed at the same time. */
  concurrency: number;
  /** Shortest document text worth sending to the model. */
  minTextLength: number;
}

const defaultLogger = createLogger('Batch');

const DEFAULT_BATCH_OPTIONS: BatchOptions = {
  concurrency: 4,
  minTextLength: EXTRACTION_CONFIG.minTextLength,
};

function requireComplete<T>(taskName: string, result: ExtractionResult<T>): T {
  if (!result.complete) {
    throw new IncompleteExtractionError(taskName, result.missingFields);
  }
  return result.data;
}

function classifyFailure(error: unknown): FailureKind {
  if (error instanceof PreconditionError) return 'precondition';
  if (error instanceof IncompleteExtractionError) return 'incomplete';
  return 'unexpected';
}

/** Paths already present in the success log. */
export async function loadCompletedPaths(successLog: JsonlLog<SuccessRecord>): Promise<Set<string>> {
  const completed = new Set<string>();
  for (const record of await successLog.readAll()) {
    if (typeof record === 'object' && record !== null && 'path' in record) {
      const { path } = record;
      if (typeof path === 'string') completed.add(path);
    }
  }
  return completed;
}

/**
 * Extracts one document's record. Throws PreconditionError for missing or
 * too-short text and IncompleteExtractionError when a required field stays
 * unset.
 */
export async function extractDocument(
  document: DocumentInfo,
  deps: Pick<BatchDependencies, 'extractor' | 'textSource'>,
  options: Pick<BatchOptions, 'minTextLength'> = DEFAULT_BATCH_OPTIONS
): Promise<SuccessRecord> {
  const text = await deps.textSource.read(document);
  if (text === null) {
    throw new PreconditionError(PAPER_SUMMARY_TASK.name, `no text extractor for ${document.kind}`);
  }

  const summary = requireComplete(
    PAPER_SUMMARY_TASK.name,
    await deps.extractor.extract(text, PAPER_SUMMARY_TASK, { minTextLength: options.minTextLength })
  );

  if (document.year === null) {
    return { ...document, ...summary };
  }

  const publication = JSON.stringify({ year: document.year, month_range: document.month_range });
  const dates = requireComplete(
    DATE_RANGE_TASK.name,
    await deps.extractor.extract(publication, DATE_RANGE_TASK)
  );
  return { ...document, ...summary, ...dates };
}

export async function processDocument(
  document: DocumentInfo,
  deps: BatchDependencies,
  options: BatchOptions = DEFAULT_BATCH_OPTIONS
): Promise<DocumentOutcome> {
  const logger = deps.logger ?? defaultLogger;
  try {
    const record = await extractDocument(document, deps, options);
    await deps.successLog.append(record);
    logger.info(`Extracted ${document.name}`);
    return { status: 'succeeded', path: document.path, record };
  } catch (error) {
    const kind = classifyFailure(error);
    const message = describeError(error);
    if (kind === 'unexpected') {
      logger.error(`Unexpected error for ${document.path}`, { error: message });
    } else {
      logger.warn(`Extraction failed for ${document.path}`, { kind, error: message });
    }
    try {
      await deps.failureLog.append(document);
    } catch (appendError) {
      logger.error(`Could not record failure for ${document.path}`, {
        error: describeError(appendError),
      });
    }
    return { status: 'failed', path: document.path, kind, error: message };
  }
}

/**
 * Processes every document not yet in the success log. Failures are
 * recorded per document and never abort the batch.
 */
export async function runBatch(
  documents: DocumentInfo[],
  deps: BatchDependencies,
  options: BatchOptions = DEFAULT_BATCH_OPTIONS
): Promise<BatchSummary> {
  const logger = deps.logger ?? defaultLogger;
  const startedAt = Date.now();
  const seen = await loadCompletedPaths(deps.successLog);

  const pending: DocumentInfo[] = [];
  for (const document of documents) {
    if (seen.has(document.path)) continue;
    seen.add(document.path);
    pending.push(document);
  }

  const skipped = documents.length - pending.length;
  logger.info(`Processing ${pending.length} documents (${skipped} already done or duplicated)`);

  const limiter = new Limiter({ documents: options.concurrency });
  const outcomes = await Promise.all(
    pending.map((document) => limiter.limit('documents', () => processDocument(document, deps, options)))
  );

  const failures: Record<FailureKind, number> = { precondition: 0, incomplete: 0, unexpected: 0 };
  let succeeded = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'succeeded') {
      succeeded++;
    } else {
      failures[outcome.kind]++;
    }
  }

  const summary: BatchSummary = {
    total: documents.length,
    skipped,
    succeeded,
    failed: outcomes.length - succeeded,
    failures,
    durationMs: Date.now() - startedAt,
  };
  logger.info('Batch complete', { ...summary });
  return summary;
}
