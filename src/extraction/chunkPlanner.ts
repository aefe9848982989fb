function assertCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Number of leading words sent on attempt `step` (1-based). Grows by
 * `chunkStep` per attempt and saturates at `totalWords`.
 */
export function chunkCutoff(step: number, totalWords: number, chunkStep: number): number {
  assertCount('step', step, 1);
  assertCount('totalWords', totalWords, 0);
  assertCount('chunkStep', chunkStep, 1);
  return Math.min(chunkStep * step, totalWords);
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

export function takeChunk(words: readonly string[], cutoff: number): string {
  return words.slice(0, cutoff).join(' ');
}

export interface ChunkCoverage {
  /** Most words any attempt can send. */
  maxWords: number;
  /** True when the tail of the document is never read. */
  truncated: boolean;
}

export function chunkCoverage(
  totalWords: number,
  chunkStep: number,
  maxChunks: number
): ChunkCoverage {
  assertCount('maxChunks', maxChunks, 1);
  const maxWords = chunkCutoff(maxChunks, totalWords, chunkStep);
  return { maxWords, truncated: maxWords < totalWords };
}
