import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildCacheEntry, buildCacheKey, ResponseCache, stableStringify } from '../src/utils/cache';

describe('stableStringify', () => {
  it('sorts keys and drops undefined values', () => {
    expect(stableStringify({ b: 1, a: [true, null], c: undefined })).toBe('{"a":[true,null],"b":1}');
  });
});

describe('buildCacheKey', () => {
  const parts = {
    agentName: 'PaperSummary',
    model: 'test-model',
    promptVersion: 'v1',
    schemaVersion: 'v1',
    input: 'prompt text',
  };

  it('is stable for identical inputs', () => {
    expect(buildCacheKey(parts)).toEqual(buildCacheKey({ ...parts }));
  });

  it('changes with the schema version or the input', () => {
    const base = buildCacheKey(parts).key;
    expect(buildCacheKey({ ...parts, schemaVersion: 'v2' }).key).not.toBe(base);
    expect(buildCacheKey({ ...parts, input: 'other prompt' }).key).not.toBe(base);
  });
});

describe('buildCacheEntry', () => {
  it('hashes the value into the metadata', () => {
    const meta = {
      agentName: 'PaperSummary',
      promptVersion: 'v1',
      schemaVersion: 'v1',
      model: 'test-model',
      inputHash: 'abc',
      durationMs: 12,
    };
    const first = buildCacheEntry(meta, { title: 'T' });
    const second = buildCacheEntry(meta, { title: 'T' });
    expect(first.meta.outputHash).toBe(second.meta.outputHash);
    expect(first.meta.outputHash).toMatch(/^[0-9a-f]{64}$/);
    expect(first.value).toEqual({ title: 'T' });
  });
});

describe('ResponseCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'response-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a key that was never written as null', async () => {
    const cache = new ResponseCache(path.join(dir, 'not-created-yet'));
    await expect(cache.read('absent')).resolves.toBeNull();
  });

  it('returns what was written', async () => {
    const cache = new ResponseCache(dir);
    const entry = buildCacheEntry(
      {
        agentName: 'PaperSummary',
        promptVersion: 'v1',
        schemaVersion: 'v1',
        model: 'test-model',
        inputHash: 'abc',
        durationMs: 5,
      },
      { title: 'T' }
    );

    await cache.write('k1', entry);
    await expect(cache.read('k1')).resolves.toEqual(entry);
    expect(await fs.readdir(dir)).toEqual(['k1.json']);
  });
});
