import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { JsonlLog } from '../src/utils/jsonlLog';
import { createLogger } from '../src/utils/logger';

describe('JsonlLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jsonl-log-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a missing file as empty', async () => {
    const log = new JsonlLog(path.join(dir, 'missing.jsonl'));
    await expect(log.readAll()).resolves.toEqual([]);
  });

  it('appends one line per record, creating parent directories', async () => {
    const filePath = path.join(dir, 'nested', 'success.jsonl');
    const log = new JsonlLog<{ path: string; n: number }>(filePath);

    await log.append({ path: 'a.pdf', n: 1 });
    await log.append({ path: 'b.pdf', n: 2 });

    expect(await fs.readFile(filePath, 'utf8')).toBe(
      '{"path":"a.pdf","n":1}\n{"path":"b.pdf","n":2}\n'
    );
    await expect(log.readAll()).resolves.toEqual([
      { path: 'a.pdf', n: 1 },
      { path: 'b.pdf', n: 2 },
    ]);
  });

  it('keeps concurrent appends whole', async () => {
    const filePath = path.join(dir, 'concurrent.jsonl');
    const log = new JsonlLog<{ id: number; body: string }>(filePath);
    const body = 'x'.repeat(20000);

    await Promise.all(Array.from({ length: 25 }, (_, id) => log.append({ id, body })));

    const lines = (await fs.readFile(filePath, 'utf8')).split('\n').filter((line) => line.length > 0);
    expect(lines).toHaveLength(25);
    const ids = lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'id' in parsed ? parsed.id : null;
    });
    expect(ids).toEqual(Array.from({ length: 25 }, (_, id) => id));
  });

  it('skips malformed lines', async () => {
    const filePath = path.join(dir, 'torn.jsonl');
    await fs.writeFile(filePath, '{"path":"a.pdf"}\n{"path":"b.p\n\n{"path":"c.pdf"}\n');
    const log = new JsonlLog(filePath, createLogger('Test', 'silent'));

    await expect(log.readAll()).resolves.toEqual([{ path: 'a.pdf' }, { path: 'c.pdf' }]);
  });
});
