import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const SettingsSchema = z.object({
  DATA_DIR: z.string().min(1).default('data'),
  SUCCESS_LOG_PATH: z.string().min(1).default('documents_success.jsonl'),
  FAILURE_LOG_PATH: z.string().min(1).default('documents_failed.jsonl'),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  AGENT_CACHE_DIR: z.string().min(1).default('.cache/agent_cache'),
  DISABLE_AGENT_CACHE: booleanFlag,
});

export interface BatchSettings {
  dataDir: string;
  successLogPath: string;
  failureLogPath: string;
  concurrency: number;
  cacheDir: string | null;
}

/** Empty strings count as unset so `.env` placeholders fall back to defaults. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  return Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => {
      const value = entry[1];
      return value !== undefined && value.trim().length > 0;
    })
  );
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): BatchSettings {
  const parsed = SettingsSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `- ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${issues}`);
  }
  const settings = parsed.data;
  return {
    dataDir: settings.DATA_DIR,
    successLogPath: settings.SUCCESS_LOG_PATH,
    failureLogPath: settings.FAILURE_LOG_PATH,
    concurrency: settings.BATCH_CONCURRENCY,
    cacheDir: settings.DISABLE_AGENT_CACHE ? null : settings.AGENT_CACHE_DIR,
  };
}
