import 'dotenv/config';
import { AGENT_MODELS, EXTRACTION_CONFIG } from './agents/config';
import { createGeminiGenerator } from './agents/gemini';
import { StructuredAgent } from './agents/runAgent';
import { loadSettings, type BatchSettings } from './config/settings';
import { ContentExtractor } from './extraction/extractor';
import { collectDocuments, type DocumentInfo } from './ingest/documents';
import { runBatch } from './pipeline/runBatch';
import type { SuccessRecord } from './pipeline/types';
import { ResponseCache } from './utils/cache';
import { createFileTextSource } from './utils/documentParser';
import { JsonlLog } from './utils/jsonlLog';
import { createLogger } from './utils/logger';

export function createExtractor(settings: Pick<BatchSettings, 'cacheDir'>): ContentExtractor {
  const apiKey = process.env.GOOGLE_API_KEY ?? process.env.GEMINI_API_KEY ?? '';
  const generator = createGeminiGenerator(apiKey, AGENT_MODELS.extraction);
  const cache = settings.cacheDir ? new ResponseCache(settings.cacheDir) : undefined;
  const agent = new StructuredAgent(generator, undefined, createLogger('Agent'), cache);
  return new ContentExtractor(agent, createLogger('Extractor'));
}

async function main(): Promise<void> {
  const logger = createLogger('Main');
  const settings = loadSettings();
  const extractor = createExtractor(settings);

  const documents = await collectDocuments(settings.dataDir);
  logger.info(`Found ${documents.length} documents under ${settings.dataDir}`);

  const summary = await runBatch(
    documents,
    {
      extractor,
      textSource: createFileTextSource(),
      successLog: new JsonlLog<SuccessRecord>(settings.successLogPath),
      failureLog: new JsonlLog<DocumentInfo>(settings.failureLogPath),
      logger: createLogger('Batch'),
    },
    { concurrency: settings.concurrency, minTextLength: EXTRACTION_CONFIG.minTextLength }
  );

  console.log('Batch completed:', summary);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { ContentExtractor } from './extraction/extractor';
export { FieldTracker } from './extraction/fieldTracker';
export { PromptTemplate } from './extraction/promptTemplate';
export { chunkCutoff, chunkCoverage } from './extraction/chunkPlanner';
export { PAPER_SUMMARY_TASK, DATE_RANGE_TASK } from './extraction/tasks';
export { StructuredAgent } from './agents/runAgent';
export { runBatch, processDocument, extractDocument } from './pipeline/runBatch';
export * from './agents/errors';
export * from './agents/schemas';
export * from './extraction/types';
export * from './pipeline/types';
