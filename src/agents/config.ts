export const AGENT_MODELS = {
  extraction: process.env.EXTRACTION_MODEL || 'gemini-2.5-flash',
} as const;

export type AgentConfig = {
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
};

export const AGENT_CONFIG: AgentConfig = {
  maxRetries: Number(process.env.AGENT_MAX_RETRIES || '2'),
  timeoutMs: Number(process.env.AGENT_TIMEOUT_MS || '60000'),
  maxTokens: 4096,
};

export type ExtractionOptions = {
  /** Words added to the prefix on every attempt. */
  chunkStep: number;
  /** Attempt budget; text past chunkStep * maxChunks words is never read. */
  maxChunks: number;
  maxRetries: number;
  minTextLength: number;
};

export const EXTRACTION_CONFIG: ExtractionOptions = {
  chunkStep: Number(process.env.CHUNK_STEP || '300'),
  maxChunks: Number(process.env.MAX_CHUNKS || '20'),
  maxRetries: AGENT_CONFIG.maxRetries,
  minTextLength: Number(process.env.MIN_TEXT_LENGTH || '100'),
};
