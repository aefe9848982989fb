import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';

export interface CacheKeyParts {
  agentName: string;
  model: string;
  promptVersion: string;
  schemaVersion: string;
  input: unknown;
}

export interface CacheMeta {
  createdAt: string;
  durationMs: number;
  agentName: string;
  promptVersion: string;
  schemaVersion: string;
  model: string;
  inputHash: string;
  outputHash: string;
  finishReason?: string;
}

export interface CacheEntry {
  meta: CacheMeta;
  value: unknown;
}

export function stableStringify(value: unknown): string {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const mapped = value.map((item) => stableStringify(item));
    return `[${mapped.join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== 'function' && typeof v !== 'symbol')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const mapped = entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${mapped.join(',')}}`;
}

function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function buildCacheKey(parts: CacheKeyParts): { key: string; inputHash: string } {
  const inputHash = sha256(stableStringify(parts.input));
  const raw = [
    parts.model,
    parts.agentName,
    parts.promptVersion,
    parts.schemaVersion,
    inputHash,
  ].join('|');
  return { key: sha256(raw), inputHash };
}

export function computeOutputHash(value: unknown): string {
  return sha256(stableStringify(value));
}

export function buildCacheEntry(
  meta: Omit<CacheMeta, 'outputHash' | 'createdAt'>,
  value: unknown
): CacheEntry {
  return {
    meta: {
      ...meta,
      outputHash: computeOutputHash(value),
      createdAt: new Date().toISOString(),
    },
    value,
  };
}

function isCacheEntry(data: unknown): data is CacheEntry {
  return typeof data === 'object' && data !== null && 'meta' in data && 'value' in data;
}

/**
 * Validated model responses stored one JSON file per key. Values are
 * re-validated by the caller on read.
 */
export class ResponseCache {
  constructor(readonly root: string) {}

  private filePath(key: string): string {
    return path.join(this.root, `${key}.json`);
  }

  async read(key: string): Promise<CacheEntry | null> {
    try {
      const data: unknown = JSON.parse(await fs.readFile(this.filePath(key), 'utf8'));
      return isCacheEntry(data) ? data : null;
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
    const filePath = this.filePath(key);
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(entry), { encoding: 'utf8' });
    await fs.rename(tmpPath, filePath);
  }
}
