/**
 * Canonical job record as persisted in the snapshot file.
 * Keys are snake_case because the snapshot is a shared on-disk format.
 */
export interface CanonicalJob {
  id: string;
  title: string;
  company: string;
  location: string | null;
  salary: string | null;
  url: string;
  /** UTC, second precision, no zone suffix: `2026-10-19T06:00:00` */
  scraped_at: string;
  source: string;
  posted_at?: string | null;
  employment_type?: string | null;
}

export type Snapshot = CanonicalJob[];

/**
 * Raw adapter output. Shapes differ per site; the normalizer reads it through
 * the adapter's field map.
 */
export type RawJobRecord = Record<string, unknown>;

export type MergePolicy = 'replace' | 'union';

export const MERGE_POLICIES: readonly MergePolicy[] = ['replace', 'union'];
