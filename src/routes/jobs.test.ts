import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../server';
import type { CanonicalJob } from '../pipeline/types';
import type { RunSummary } from '../scrapers/runner';
import { UnknownSourceError } from '../errors';

function job(overrides: Partial<CanonicalJob>): CanonicalJob {
  return {
    id: 'id',
    title: 'Title',
    company: 'Acme',
    location: 'Amarillo, TX',
    salary: null,
    url: 'https://example.com/jobs/1',
    scraped_at: '2026-10-19T06:00:00',
    source: 'Acme',
    ...overrides,
  };
}

const SNAPSHOT: CanonicalJob[] = [
  job({ id: 'a', title: 'Diesel Mechanic', company: 'Yellowhouse Machinery', source: 'Yellowhouse Machinery', scraped_at: '2026-10-18T06:00:00' }),
  job({ id: 'b', title: 'Teller', company: 'Amarillo National Bank', source: 'ANB', location: 'Canyon, TX', scraped_at: '2026-10-19T06:00:00' }),
  job({ id: 'c', title: 'Lab Mechanic', company: 'WTAMU', source: 'WTAMU', location: 'Canyon, TX', scraped_at: '2026-10-17T06:00:00' }),
];

const SUMMARY: RunSummary = {
  policy: 'replace',
  previousCount: 3,
  snapshotCount: 2,
  saved: true,
  sources: { anb: { jobsFound: 2, jobsKept: 2, rejected: 0 } },
};

describe('job routes', () => {
  let server: Server;
  let baseUrl: string;
  const reader = {
    read: vi.fn(async () => ({ jobs: SNAPSHOT, origin: 'local' as const })),
    clear: vi.fn(),
  };
  const runScrape = vi.fn(async (_options: { sources?: string[]; force?: boolean }) => SUMMARY);

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    reader.read.mockClear();
    reader.clear.mockClear();
    runScrape.mockClear();

    const app = createApp({ reader, runScrape });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  it('lists jobs newest first with filters applied', async () => {
    const res = await fetch(`${baseUrl}/api/jobs?keyword=mechanic&location=canyon`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, jobs: [SNAPSHOT[2]], total: 1, loaded: 3 });

    const all = await fetch(`${baseUrl}/api/jobs`);
    const body: unknown = await all.json();
    expect(body).toEqual({ success: true, jobs: [SNAPSHOT[1], SNAPSHOT[0], SNAPSHOT[2]], total: 3, loaded: 3 });
  });

  it('matches company exactly', async () => {
    const res = await fetch(`${baseUrl}/api/jobs?company=${encodeURIComponent('Amarillo National Bank')}`);
    expect(await res.json()).toEqual({ success: true, jobs: [SNAPSHOT[1]], total: 1, loaded: 3 });
  });

  it('returns companies and stats', async () => {
    const filters = await fetch(`${baseUrl}/api/jobs/filters`);
    expect(await filters.json()).toEqual({
      success: true,
      companies: ['Amarillo National Bank', 'WTAMU', 'Yellowhouse Machinery'],
    });

    const stats = await fetch(`${baseUrl}/api/jobs/stats`);
    expect(await stats.json()).toEqual({
      success: true,
      total: 3,
      bySource: { 'Yellowhouse Machinery': 1, ANB: 1, WTAMU: 1 },
      lastScrape: '2026-10-19T06:00:00',
      origin: 'local',
    });
  });

  it('answers 500 when the snapshot cannot be read', async () => {
    reader.read.mockRejectedValueOnce(new Error('disk gone'));
    const res = await fetch(`${baseUrl}/api/jobs`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'Failed to list jobs' });
  });

  it('clears the reader cache', async () => {
    const res = await fetch(`${baseUrl}/api/cache/clear`, { method: 'POST' });
    expect(await res.json()).toEqual({ success: true });
    expect(reader.clear).toHaveBeenCalledTimes(1);
  });

  it('runs a scrape for one source and clears the cache', async () => {
    const res = await fetch(`${baseUrl}/api/jobs/scrape`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ source: 'anb', force: true }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, source: 'anb', ...SUMMARY });
    expect(runScrape).toHaveBeenCalledWith({ sources: ['anb'], force: true });
    expect(reader.clear).toHaveBeenCalledTimes(1);
  });

  it('runs every source when none is named', async () => {
    await fetch(`${baseUrl}/api/jobs/scrape`, { method: 'POST' });
    expect(runScrape).toHaveBeenCalledWith({ sources: undefined, force: false });
  });

  it('answers 400 for an unknown source', async () => {
    runScrape.mockRejectedValueOnce(new UnknownSourceError('nope', ['anb', 'fmc']));
    const res = await fetch(`${baseUrl}/api/jobs/scrape`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ source: 'nope' }),
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Unknown source: nope. Available: anb, fmc' });
    expect(reader.clear).not.toHaveBeenCalled();
  });

  it('answers 500 with the message when the run fails', async () => {
    runScrape.mockRejectedValueOnce(new Error('snapshot write failed'));
    const res = await fetch(`${baseUrl}/api/jobs/scrape`, { method: 'POST' });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'snapshot write failed' });
  });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ status: 'ok', service: 'jobs' });
  });
});
