import * as fs from 'fs/promises';
import * as path from 'path';
import { Limiter } from './limiter';
import { createLogger, describeError, type Logger } from './logger';

/**
 * Append-only newline-delimited JSON file. Appends through one instance
 * are serialized, so concurrent writers never interleave lines; keep a
 * single instance per file.
 */
export class JsonlLog<T extends object = Record<string, unknown>> {
  private readonly lock = new Limiter({ append: 1 });

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = createLogger('JsonlLog')
  ) {}

  async append(record: T): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    await this.lock.limit('append', async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, { encoding: 'utf8' });
    });
  }

  /** Parsed records; malformed lines (e.g. a torn last write) are skipped. */
  async readAll(): Promise<unknown[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: unknown[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.trim().length === 0) return;
      try {
        records.push(JSON.parse(line));
      } catch (error) {
        this.logger.warn(`Skipping malformed line ${index + 1} in ${this.filePath}`, {
          error: describeError(error),
        });
      }
    });
    return records;
  }
}
