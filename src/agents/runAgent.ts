import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AGENT_CONFIG, type AgentConfig } from './config';
import { TimeoutError, SchemaValidationError, AgentExecutionError } from './errors';
import type { GeneratedText, TextGenerator } from './gemini';
import { buildCacheEntry, buildCacheKey, type ResponseCache } from '../utils/cache';
import { limit } from '../utils/limiter';
import { createLogger, describeError, type Logger } from '../utils/logger';

export interface CompletionRequest<T> {
  agentName: string;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /**
   * Extra attempts after the first one for malformed or invalid output.
   * Defaults to the agent's `maxRetries`.
   */
  maxRetries?: number;
  version?: { prompt: string; schema: string };
}

/**
 * Prompt in, schema instance out. Throws SchemaValidationError when the
 * model keeps answering with output the schema rejects.
 */
export interface StructuredCompleter {
  complete<T>(request: CompletionRequest<T>): Promise<T>;
}

function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.') || '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
}

function withTimeout<T>(promise: Promise<T>, agentName: string, timeoutMs: number): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimeoutError(agentName, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  });
}

export class StructuredAgent implements StructuredCompleter {
  constructor(
    private readonly generator: TextGenerator,
    private readonly config: AgentConfig = AGENT_CONFIG,
    private readonly logger: Logger = createLogger('Agent'),
    private readonly cache?: ResponseCache
  ) {}

  async complete<T>(request: CompletionRequest<T>): Promise<T> {
    const { agentName, schema } = request;
    const totalAttempts = Math.max(0, request.maxRetries ?? this.config.maxRetries) + 1;
    // a generic schema type makes zodToJsonSchema's type instantiation unbounded
    const jsonSchema = JSON.stringify(zodToJsonSchema(schema as any, { target: 'openApi3' }));
    const basePrompt = `${request.prompt}\n\nRespond with a single JSON object that conforms to this JSON Schema:\n${jsonSchema}`;

    const cacheKey = this.cache
      ? buildCacheKey({
          agentName,
          model: this.generator.model,
          promptVersion: request.version?.prompt ?? 'v0',
          schemaVersion: request.version?.schema ?? 'v0',
          input: request.prompt,
        })
      : null;

    if (this.cache && cacheKey) {
      const hit = await this.cache.read(cacheKey.key);
      if (hit) {
        const cached = schema.safeParse(hit.value);
        if (cached.success) {
          this.logger.debug(`[${agentName}] Cache hit`);
          return cached.data;
        }
        this.logger.warn(`[${agentName}] Ignoring cached response that no longer validates`);
      }
    }

    let lastIssues: string[] = [];

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      const startedAt = Date.now();
      const prompt =
        attempt > 1 && lastIssues.length > 0
          ? `${basePrompt}\n\nYour previous response was rejected:\n${lastIssues
              .map((issue) => `- ${issue}`)
              .join('\n')}\n\nReturn valid JSON only.`
          : basePrompt;

      this.logger.debug(
        `[${agentName}] Attempt ${attempt}/${totalAttempts} (model: ${this.generator.model}, timeoutMs: ${this.config.timeoutMs})`
      );

      let generated: GeneratedText;
      try {
        generated = await limit('llm', () =>
          withTimeout(this.generator.generate(prompt), agentName, this.config.timeoutMs)
        );
      } catch (error) {
        if (error instanceof TimeoutError) {
          throw error;
        }
        if (attempt === totalAttempts) {
          throw new AgentExecutionError(
            agentName,
            error instanceof Error ? error : new Error(String(error))
          );
        }
        this.logger.warn(`[${agentName}] Error on attempt ${attempt} (will retry)`, {
          error: describeError(error),
        });
        continue;
      }

      let jsonData: unknown;
      try {
        jsonData = JSON.parse(stripCodeFence(generated.text));
      } catch (parseError) {
        lastIssues = [`response is not valid JSON (${describeError(parseError)})`];
        this.logger.warn(`[${agentName}] JSON parse error on attempt ${attempt}`, {
          preview: generated.text.slice(0, 200),
        });
        continue;
      }

      const validationResult = schema.safeParse(jsonData);
      if (!validationResult.success) {
        lastIssues = formatValidationErrors(validationResult.error);
        this.logger.warn(`[${agentName}] Schema validation failed on attempt ${attempt}`, {
          errors: lastIssues,
        });
        continue;
      }

      const durationMs = Date.now() - startedAt;
      this.logger.debug(`[${agentName}] Success on attempt ${attempt}`, {
        durationMs,
        inputTokens: generated.inputTokens,
        outputTokens: generated.outputTokens,
      });

      if (this.cache && cacheKey) {
        await this.cache.write(
          cacheKey.key,
          buildCacheEntry(
            {
              agentName,
              promptVersion: request.version?.prompt ?? 'v0',
              schemaVersion: request.version?.schema ?? 'v0',
              model: this.generator.model,
              inputHash: cacheKey.inputHash,
              durationMs,
              finishReason: generated.finishReason,
            },
            validationResult.data
          )
        );
      }

      return validationResult.data;
    }

    throw new SchemaValidationError(agentName, lastIssues, totalAttempts);
  }
}
