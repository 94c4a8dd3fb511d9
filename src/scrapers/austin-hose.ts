import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { fetchHtml } from './common';

const LIST_URL =
  'https://recruiting.paylocity.com/recruiting/jobs/All/0a932b3f-65a0-4207-b5be-70d84a78ecaa/Austin-Hose';

const JS_GATE_TEXT = 'In order to use this site, it is necessary to enable JavaScript.';

export function parseAustinHoseRows(html: string): RawJobRecord[] {
  if (html.includes(JS_GATE_TEXT)) {
    throw new Error('Paylocity returned its JavaScript/unsupported-browser page');
  }

  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $('div.row.job-listing-job-item').each((_, row) => {
    const el = $(row);
    const link = el.find('.job-title-column .job-item-title a').first();
    if (link.length === 0) return;

    const href = link.attr('href')?.trim() ?? '';
    const numericId = href.match(/\/Details\/(\d+)/)?.[1] ?? null;

    jobs.push({
      title: link.text(),
      url: href || LIST_URL,
      location: el.find('.location-column span').first().text(),
      nativeId: numericId,
    });
  });

  return jobs;
}

export class AustinHoseAdapter implements SourceAdapter {
  readonly name = 'austin-hose';
  readonly company = 'Austin Hose';
  readonly source = 'Austin Hose';
  readonly baseUrl = LIST_URL;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    console.log('[AustinHose] Fetching Paylocity listings...');
    const html = await fetchHtml(LIST_URL, { signal: context.signal, referer: LIST_URL });
    const jobs = parseAustinHoseRows(html);
    console.log(`[AustinHose] Extracted ${jobs.length} listings`);
    return jobs;
  }
}
