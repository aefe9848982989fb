import type { DocumentInfo } from '../ingest/documents';

export type FailureKind = 'precondition' | 'incomplete' | 'unexpected';

export type DocumentOutcome =
  | { status: 'succeeded'; path: string; record: SuccessRecord }
  | { status: 'failed'; path: string; kind: FailureKind; error: string };

/** Document metadata plus every extracted field. */
export type SuccessRecord = DocumentInfo & Record<string, unknown>;

export interface BatchSummary {
  total: number;
  skipped: number;
  succeeded: number;
  failed: number;
  failures: Record<FailureKind, number>;
  durationMs: number;
}
