import * as fs from 'fs/promises';
import pdfParse from 'pdf-parse';
import mammoth from 'mammoth';
import type { DocumentInfo } from '../ingest/documents';
import { createLogger, describeError, type Logger } from './logger';

export class DocumentParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly originalError: Error
  ) {
    super(`Failed to read text from ${filePath}: ${originalError.message}`);
    this.name = 'DocumentParseError';
    this.cause = originalError;
  }
}

/** Raw text of a document, or null when the format has no extractor. */
export interface TextSource {
  read(document: Pick<DocumentInfo, 'path' | 'kind'>): Promise<string | null>;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(codePoint: number): string {
  return codePoint <= MAX_CODE_POINT ? String.fromCodePoint(codePoint) : '\uFFFD';
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return fromCodePoint(parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return fromCodePoint(parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

export function htmlToText(html: string): string {
  const withoutNoise = html
    .replace(/<script[\s\S]*?<\/script>/gi, '')
    .replace(/<style[\s\S]*?<\/style>/gi, '')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '');

  const withBreaks = withoutNoise.replace(
    /<\/?(p|div|br|hr|h[1-6]|li|ul|ol|tr|table|section|article|header|footer|blockquote|pre|title)\b[^>]*>/gi,
    '\n'
  );

  return decodeEntities(withBreaks.replace(/<[^>]*>/g, ' '))
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\r]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

async function parsePDF(buffer: Buffer): Promise<string> {
  const data = await pdfParse(buffer);
  return data.text;
}

async function parseDOCX(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

export function createFileTextSource(logger: Logger = createLogger('Parser')): TextSource {
  return {
    async read(document) {
      const t0 = Date.now();
      let text: string;
      try {
        const buffer = await fs.readFile(document.path);
        switch (document.kind) {
          case 'PDF':
            text = await parsePDF(buffer);
            break;
          case 'DOCX':
            text = await parseDOCX(buffer);
            break;
          case 'HTML':
          case 'HTM':
            text = htmlToText(buffer.toString('utf-8'));
            break;
          default:
            return null;
        }
      } catch (error) {
        logger.warn(`Could not read ${document.path}`, { error: describeError(error) });
        throw new DocumentParseError(
          document.path,
          error instanceof Error ? error : new Error(String(error))
        );
      }
      logger.info(`Extracted ${text.length} chars from ${document.path} in ${Date.now() - t0}ms`);
      return text;
    },
  };
}
