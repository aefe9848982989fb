import { EXTRACTION_CONFIG, type ExtractionOptions } from '../agents/config';
import { PreconditionError, SchemaValidationError } from '../agents/errors';
import type { StructuredCompleter } from '../agents/runAgent';
import { createLogger, type Logger } from '../utils/logger';
import { chunkCoverage, chunkCutoff, splitWords, takeChunk } from './chunkPlanner';
import { FieldTracker } from './fieldTracker';
import type { ExtractionResult, ExtractionTask } from './types';

/**
 * Progressive-chunk extraction. Each attempt sends a longer prefix of the
 * document (a cumulative prefix, not a sliding window) and asks only for
 * the fields still unset, until every required field is filled, the
 * prefix stops growing or the chunk budget runs out.
 */
export class ContentExtractor {
  constructor(
    private readonly completer: StructuredCompleter,
    private readonly logger: Logger = createLogger('Extractor'),
    private readonly defaults: ExtractionOptions = EXTRACTION_CONFIG
  ) {}

  resolveOptions<T extends Record<string, unknown>>(
    task: ExtractionTask<T>,
    overrides: Partial<ExtractionOptions> = {}
  ): ExtractionOptions {
    return { ...this.defaults, ...task.defaults, ...overrides };
  }

  /**
   * Never throws for unfilled fields: an incomplete run comes back with
   * `complete: false` and whatever was found. Throws PreconditionError for
   * text shorter than `minTextLength`.
   */
  async extract<T extends Record<string, unknown>>(
    text: string,
    task: ExtractionTask<T>,
    overrides?: Partial<ExtractionOptions>
  ): Promise<ExtractionResult<T>> {
    const options = this.resolveOptions(task, overrides);
    const textLength = text.length;
    if (textLength < options.minTextLength) {
      throw new PreconditionError(
        task.name,
        `text has ${textLength} characters, at least ${options.minTextLength} required`
      );
    }

    const startedAt = Date.now();
    const words = splitWords(text);
    const totalWords = words.length;
    const coverage = chunkCoverage(totalWords, options.chunkStep, options.maxChunks);
    if (coverage.truncated) {
      this.logger.warn(
        `[${task.name}] Only the first ${coverage.maxWords} of ${totalWords} words can be read within ${options.maxChunks} chunks`
      );
    }

    const tracker = new FieldTracker(task);
    const labels = new Map<string, string>(
      task.fields.map((field): [string, string] => [field.name, field.label])
    );
    let previousCutoff = -1;
    let attempts = 0;
    let failedAttempts = 0;

    for (let step = 1; step <= options.maxChunks; step++) {
      if (tracker.isComplete()) break;

      const cutoff = chunkCutoff(step, totalWords, options.chunkStep);
      if (cutoff === previousCutoff) {
        this.logger.debug(`[${task.name}] Whole text already sent at ${cutoff} words, stopping`);
        break;
      }
      previousCutoff = cutoff;

      const pending = tracker.unsetFields();
      const prompt = task.prompt.render({
        chunk: takeChunk(words, cutoff),
        fields_to_extract: pending.map((name) => `- ${labels.get(name) ?? name}`).join('\n'),
        json_keys: pending.join(', '),
      });

      attempts++;
      const chunkStartedAt = Date.now();
      let response: Partial<T>;
      try {
        response = await this.completer.complete({
          agentName: task.name,
          prompt,
          schema: task.responseSchema,
          maxRetries: options.maxRetries,
          version: task.version,
        });
      } catch (error) {
        if (!(error instanceof SchemaValidationError)) throw error;
        failedAttempts++;
        this.logger.warn(`[${task.name}] Chunk ${step} produced no valid response`, {
          words: cutoff,
          issues: error.issues,
        });
        continue;
      }

      const filled = tracker.merge(response);
      this.logger.info(
        `[${task.name}] Chunk ${step} (${cutoff} words) processed in ${Date.now() - chunkStartedAt}ms`,
        filled.length > 0 ? { filled } : undefined
      );
    }

    const stats = {
      attempts,
      failedAttempts,
      wordsSent: Math.max(0, previousCutoff),
      totalWords,
      truncated: coverage.truncated,
      durationMs: Date.now() - startedAt,
    };

    if (tracker.isComplete()) {
      this.logger.info(`[${task.name}] All required fields extracted in ${stats.durationMs}ms`);
      return { complete: true, data: tracker.finalize(), ...stats };
    }

    const missingFields = tracker.missingFields();
    this.logger.error(`[${task.name}] Required fields still missing after ${attempts} attempts`, {
      missingFields,
    });
    return { complete: false, data: tracker.snapshot(), missingFields, ...stats };
  }
}
