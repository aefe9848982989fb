import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

export const DOCUMENT_EXTENSIONS = ['.pdf', '.docx', '.htm', '.html'] as const;

export const DocumentKindSchema = z.enum(['PDF', 'DOCX', 'HTM', 'HTML']);
export type DocumentKind = z.infer<typeof DocumentKindSchema>;

export const DocumentInfoSchema = z.object({
  journal: z.string(),
  year: z.number().int().nullable(),
  month_range: z.string().nullable(),
  path: z.string(),
  kind: DocumentKindSchema,
  name: z.string(),
});

export type DocumentInfo = z.infer<typeof DocumentInfoSchema>;

function isSupported(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return DOCUMENT_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * Derives document metadata from where the file sits under `root`:
 * `<collection>/<journal>/<year>/<month_range>/<file>` carries journal,
 * year and month range; anything else only a journal (its first
 * directory, or the file stem for files directly under root).
 */
export function describeDocument(root: string, relativePath: string): DocumentInfo {
  const parts = relativePath.split(/[\\/]+/).filter((part) => part.length > 0);
  const name = parts[parts.length - 1] ?? relativePath;
  const ext = path.extname(name);
  const kind = DocumentKindSchema.parse(ext.replace('.', '').toUpperCase());
  const filePath = path.join(root, ...parts);

  if (parts.length === 5 && /^\d{4}$/.test(parts[2])) {
    return {
      journal: parts[1],
      year: Number(parts[2]),
      month_range: parts[3].toUpperCase(),
      path: filePath,
      kind,
      name,
    };
  }

  return {
    journal: parts.length > 1 ? parts[0] : path.basename(name, ext),
    year: null,
    month_range: null,
    path: filePath,
    kind,
    name,
  };
}

export async function collectDocuments(root: string): Promise<DocumentInfo[]> {
  const candidates = (await fs.readdir(root, { recursive: true })).filter(isSupported).sort();
  const documents: DocumentInfo[] = [];
  for (const relativePath of candidates) {
    const stats = await fs.stat(path.join(root, relativePath));
    if (stats.isFile()) {
      documents.push(describeDocument(root, relativePath));
    }
  }
  return documents;
}
