import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { uniqueBy } from './common';
import { acceptCookies, withBrowserPage } from './browser';

const BASE = 'https://www.paycomonline.net';
const CLIENT_KEY = 'BEC705AAE8346DB92E3A5C60250EE84C';
const LIST_URL = `${BASE}/v4/ats/web.php/jobs?clientkey=${CLIENT_KEY}`;
const CARD_LINK = `a[href*="/v4/ats/web.php/portal/${CLIENT_KEY}/jobs/"]`;

/** `?job=181177` or `/jobs/181177` → `181177`. */
export function extractJobId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url, BASE);
  } catch {
    return null;
  }
  return parsed.searchParams.get('job') ?? parsed.pathname.match(/\/jobs\/(\d+)/)?.[1] ?? null;
}

export function parsePortalCards(html: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $(CARD_LINK).each((_, anchor) => {
    const el = $(anchor);
    const href = el.attr('href')?.trim();
    if (!href) return;

    const url = new URL(href, BASE).href;
    const heading = el.find('h2[data-testid="typography"]').first();
    const title = (heading.length > 0 ? heading : el.find('h2').first()).text();
    const lines = el.find('p[data-testid="typography"]');

    jobs.push({
      title,
      url,
      location: lines.length > 0 ? lines.eq(0).text() : null,
      summary: lines.length > 1 ? lines.eq(1).text() : null,
      nativeId: extractJobId(url),
    });
  });

  return uniqueBy(jobs, job => String(job.nativeId ?? job.url));
}

export class WesternEquipmentAdapter implements SourceAdapter {
  readonly name = 'western-equipment';
  readonly company = 'Western Equipment';
  readonly source = 'Western Equipment';
  readonly baseUrl = BASE;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    return withBrowserPage('WesternEquipment', context, async page => {
      await page.goto(LIST_URL, { waitUntil: 'domcontentloaded', timeout: 60_000 });
      await acceptCookies(page, 'WesternEquipment');

      try {
        await page.waitForSelector(CARD_LINK, { timeout: 20_000 });
      } catch {
        console.log('[WesternEquipment] No job cards rendered');
        return [];
      }

      const jobs = parsePortalCards(await page.content());
      console.log(`[WesternEquipment] Extracted ${jobs.length} postings`);
      return jobs;
    });
  }
}
