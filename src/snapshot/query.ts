import type { CanonicalJob, Snapshot } from '../pipeline/types';

export interface JobFilters {
  keyword?: string;
  company?: string;
  location?: string;
}

function containsIgnoreCase(haystack: string | null, needle: string): boolean {
  return (haystack ?? '').toLowerCase().includes(needle.toLowerCase());
}

export function sortByScrapedAt(jobs: readonly CanonicalJob[]): CanonicalJob[] {
  return [...jobs].sort((a, b) => (a.scraped_at < b.scraped_at ? 1 : a.scraped_at > b.scraped_at ? -1 : 0));
}

/**
 * keyword: substring of title; company: exact; location: substring.
 * Blank filters are ignored, the rest are AND-ed.
 */
export function filterJobs(jobs: Snapshot, filters: JobFilters = {}): CanonicalJob[] {
  const keyword = filters.keyword?.trim();
  const company = filters.company?.trim();
  const location = filters.location?.trim();

  return sortByScrapedAt(jobs).filter(job => {
    if (keyword && !containsIgnoreCase(job.title, keyword)) return false;
    if (company && job.company !== company) return false;
    if (location && !containsIgnoreCase(job.location, location)) return false;
    return true;
  });
}

export function getFilterOptions(jobs: Snapshot): { companies: string[] } {
  const companies = [...new Set(jobs.map(job => job.company))];
  companies.sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
  return { companies };
}

export function getJobStats(jobs: Snapshot): {
  total: number;
  bySource: Record<string, number>;
  lastScrape: string | null;
} {
  const bySource: Record<string, number> = {};
  let lastScrape: string | null = null;
  for (const job of jobs) {
    bySource[job.source] = (bySource[job.source] ?? 0) + 1;
    if (!lastScrape || job.scraped_at > lastScrape) lastScrape = job.scraped_at;
  }
  return { total: jobs.length, bySource, lastScrape };
}
