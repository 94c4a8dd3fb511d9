import { describe, it, expect } from 'vitest';
import { collapseDuplicates, compareByRecency, mergeSnapshots } from './merge';
import type { CanonicalJob } from './types';

function job(id: string, overrides: Partial<CanonicalJob> = {}): CanonicalJob {
  return {
    id,
    title: `Job ${id}`,
    company: 'Acme',
    location: null,
    salary: null,
    url: `https://x/${id}`,
    scraped_at: '2026-10-19T06:00:00',
    source: 'Acme',
    ...overrides,
  };
}

describe('collapseDuplicates', () => {
  it('keeps the later record at its last position', () => {
    const first = job('a', { title: 'First' });
    const second = job('a', { title: 'Second' });
    const result = collapseDuplicates([first, job('b'), second]);
    expect(result.map(j => j.id)).toEqual(['b', 'a']);
    expect(result[1].title).toBe('Second');
  });
});

describe('compareByRecency', () => {
  it('prefers posted_at over scraped_at', () => {
    const posted = job('p', { posted_at: '2026-10-18', scraped_at: '2026-10-01T00:00:00' });
    const scraped = job('s', { scraped_at: '2026-10-10T00:00:00' });
    expect([scraped, posted].sort(compareByRecency).map(j => j.id)).toEqual(['p', 's']);
  });

  it('falls back to scraped_at when posted_at does not parse', () => {
    const vague = job('v', { posted_at: 'a few days ago', scraped_at: '2026-10-02T00:00:00' });
    const newer = job('n', { scraped_at: '2026-10-03T00:00:00' });
    expect([vague, newer].sort(compareByRecency).map(j => j.id)).toEqual(['n', 'v']);
  });

  it('breaks ties by ascending id', () => {
    expect([job('b'), job('a')].sort(compareByRecency).map(j => j.id)).toEqual(['a', 'b']);
  });
});

describe('mergeSnapshots', () => {
  const previous = [
    job('old', { scraped_at: '2026-10-01T00:00:00' }),
    job('shared', { title: 'Stale title', scraped_at: '2026-10-01T00:00:00' }),
  ];

  it('replace returns the fresh batch in input order', () => {
    const fresh = [job('z'), job('shared', { title: 'Fresh title' })];
    const result = mergeSnapshots(previous, fresh, 'replace');
    expect(result.map(j => j.id)).toEqual(['z', 'shared']);
    expect(result[1].title).toBe('Fresh title');
  });

  it('replace with an empty batch is empty', () => {
    expect(mergeSnapshots(previous, [], 'replace')).toEqual([]);
  });

  it('union keeps unseen previous records and sorts newest first', () => {
    const fresh = [job('shared', { title: 'Fresh title' }), job('new')];
    const result = mergeSnapshots(previous, fresh, 'union');
    expect(result.map(j => j.id)).toEqual(['new', 'shared', 'old']);
    expect(result[1].title).toBe('Fresh title');
  });

  it('union with an empty batch keeps every previous record', () => {
    const result = mergeSnapshots([job('abc')], [], 'union');
    expect(result.map(j => j.id)).toEqual(['abc']);
  });

  it('does not modify its inputs', () => {
    const prev = [job('b', { scraped_at: '2026-10-01T00:00:00' }), job('a', { scraped_at: '2026-10-05T00:00:00' })];
    mergeSnapshots(prev, [], 'union');
    expect(prev.map(j => j.id)).toEqual(['b', 'a']);
  });
});

describe('re-merging the same postings', () => {
  const previous = [job('a', { scraped_at: '2026-10-18T06:00:00' }), job('b', { scraped_at: '2026-10-17T06:00:00' })];
  const fresh = [job('a', { scraped_at: '2026-10-19T06:00:00' }), job('b', { scraped_at: '2026-10-19T06:00:00' })];

  it('replace keeps the same ids with the new scrape time', () => {
    const merged = mergeSnapshots(previous, fresh, 'replace');
    expect(merged.map(j => [j.id, j.scraped_at])).toEqual([
      ['a', '2026-10-19T06:00:00'],
      ['b', '2026-10-19T06:00:00'],
    ]);
    expect(mergeSnapshots(merged, fresh, 'replace')).toEqual(merged);
  });

  it('union keeps the same ids with the new scrape time', () => {
    const merged = mergeSnapshots(previous, fresh, 'union');
    expect(merged.map(j => [j.id, j.scraped_at])).toEqual([
      ['a', '2026-10-19T06:00:00'],
      ['b', '2026-10-19T06:00:00'],
    ]);
    expect(mergeSnapshots(merged, fresh, 'union')).toEqual(merged);
  });
});
