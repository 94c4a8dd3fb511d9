import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { fetchHtml, lastPathSegment, uniqueBy } from './common';

const BASE_URL = 'https://careers.yhmc.com/';

export function parseYellowhouseListings(html: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $('div.listing').each((_, card) => {
    const el = $(card);
    const href = el.find('a[href]').first().attr('href')?.trim() ?? '';

    jobs.push({
      title: el.find('h3.listing-title').first().text(),
      location: el.find('li.udf-1960635 span.value').first().text(),
      salary: el.find('li.udf-salary span.value').first().text(),
      url: href,
      nativeId: href ? lastPathSegment(href) : null,
    });
  });

  return jobs;
}

export class YellowhouseAdapter implements SourceAdapter {
  readonly name = 'yellowhouse';
  readonly company = 'Yellowhouse Machinery';
  readonly source = 'Yellowhouse';
  readonly baseUrl = BASE_URL;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    console.log('[Yellowhouse] Fetching listings...');
    const html = await fetchHtml(BASE_URL, { signal: context.signal });
    const jobs = uniqueBy(parseYellowhouseListings(html), job => String(job.nativeId ?? job.title));
    console.log(`[Yellowhouse] Extracted ${jobs.length} listings`);
    return jobs;
  }
}
