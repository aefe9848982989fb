import { GoogleGenerativeAIFetchError } from '@google/generative-ai';

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

/** Rate limits and server-side failures reported by the Gemini API. */
export function isTransient(error: unknown): boolean {
  return (
    error instanceof GoogleGenerativeAIFetchError &&
    error.status !== undefined &&
    TRANSIENT_STATUSES.has(error.status)
  );
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: { tries?: number; baseMs?: number; maxMs?: number }
): Promise<T> {
  const tries = opts?.tries ?? 6;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isTransient(e) || i === tries - 1) {
        throw e;
      }
      const jitter = Math.floor(Math.random() * 250);
      const delay = Math.min(maxMs, baseMs * Math.pow(2, i)) + jitter;
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastErr;
}
