import 'dotenv/config';
import * as path from 'path';
import { loadSettings } from '../src/config/settings';
import { PAPER_SUMMARY_TASK } from '../src/extraction/tasks';
import { describeDocument } from '../src/ingest/documents';
import { createFileTextSource } from '../src/utils/documentParser';
import { createExtractor } from '../src';

async function main() {
  const filePath = process.argv[2];
  if (!filePath) {
    console.error('Usage: npm run extract -- <path-to-document>');
    console.error('Supported formats: .pdf, .docx, .htm, .html');
    process.exit(1);
  }

  const document = describeDocument(path.dirname(filePath), path.basename(filePath));
  const text = await createFileTextSource().read(document);
  if (text === null) {
    console.error(`No text extractor for ${document.kind}`);
    process.exit(1);
  }

  const extractor = createExtractor(loadSettings());
  const result = await extractor.extract(text, PAPER_SUMMARY_TASK);

  if (!result.complete) {
    console.error(`Missing fields: ${result.missingFields.join(', ')}`);
  }
  console.log(JSON.stringify(result.data, null, 2));
  console.log(
    `[${result.attempts} attempts, ${result.failedAttempts} failed, ${result.wordsSent}/${result.totalWords} words sent]`
  );
}

main().catch((error: unknown) => {
  console.error('Extraction failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
