const BASE = '/api';

export interface Job {
  id: string;
  title: string;
  company: string;
  location: string | null;
  salary: string | null;
  url: string;
  scraped_at: string;
  source: string;
  posted_at?: string | null;
  employment_type?: string | null;
}

export interface Stats {
  total: number;
  bySource: Record<string, number>;
  lastScrape: string | null;
  origin: 'local' | 'remote';
}

export interface Filters {
  keyword?: string;
  company?: string;
  location?: string;
}

export interface JobsResponse {
  jobs: Job[];
  total: number;
  /** Size of the whole snapshot before filtering. */
  loaded: number;
}

async function getJson(url: string, init?: RequestInit) {
  const res = await fetch(url, init);
  if (!res.ok) {
    throw new Error(`Request to ${url} failed with ${res.status}`);
  }
  return res.json();
}

export async function fetchJobs(filters: Filters = {}): Promise<JobsResponse> {
  const params = new URLSearchParams();
  for (const [k, v] of Object.entries(filters)) {
    if (v != null && v !== '') params.set(k, String(v));
  }
  const data = await getJson(`${BASE}/jobs?${params}`);
  return { jobs: data.jobs ?? [], total: data.total ?? 0, loaded: data.loaded ?? 0 };
}

export async function fetchCompanies(): Promise<string[]> {
  const data = await getJson(`${BASE}/jobs/filters`);
  return data.companies ?? [];
}

export async function fetchStats(): Promise<Stats> {
  return getJson(`${BASE}/jobs/stats`);
}

export async function clearCache(): Promise<void> {
  await getJson(`${BASE}/cache/clear`, { method: 'POST' });
}
