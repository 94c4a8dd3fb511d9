import type { CanonicalJob, MergePolicy, Snapshot } from './types';

/**
 * Drops earlier records that share an id with a later one. The survivor keeps
 * the position of its last occurrence.
 */
export function collapseDuplicates(jobs: readonly CanonicalJob[]): CanonicalJob[] {
  const byId = new Map<string, CanonicalJob>();
  for (const job of jobs) {
    byId.delete(job.id);
    byId.set(job.id, job);
  }
  return [...byId.values()];
}

// Zone-less ISO timestamps are read as UTC.
function parseTime(value: string | null | undefined): number | null {
  if (!value) return null;
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(value);
  const isoLike = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/.test(value);
  const ms = Date.parse(isoLike && !hasZone ? `${value}Z` : value);
  return Number.isNaN(ms) ? null : ms;
}

export function recencyOf(job: CanonicalJob): number {
  return parseTime(job.posted_at) ?? parseTime(job.scraped_at) ?? 0;
}

export function compareByRecency(a: CanonicalJob, b: CanonicalJob): number {
  const diff = recencyOf(b) - recencyOf(a);
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Combines the previous snapshot with this run's records.
 *
 * `replace` returns the collapsed fresh batch as-is; `union` also carries
 * forward previous records that were not re-observed and sorts newest first.
 */
export function mergeSnapshots(
  previous: Snapshot,
  fresh: readonly CanonicalJob[],
  policy: MergePolicy,
): Snapshot {
  const collapsed = collapseDuplicates(fresh);
  if (policy === 'replace') {
    return collapsed;
  }

  const freshIds = new Set(collapsed.map(job => job.id));
  const carried = collapseDuplicates(previous).filter(job => !freshIds.has(job.id));
  return [...collapsed, ...carried].sort(compareByRecency);
}
