import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { lastPathSegment } from './common';
import { acceptCookies, withBrowserPage } from './browser';

const LIST_URL = 'https://www.talonlpe.com/employment';
const APPLY_LINK = 'a[href^="https://apply.teamengine.io/apply/"]';

/** Table rows holding a TeamEngine apply link; the second cell is the location. */
export function parseTalonRows(html: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $('tr').each((_, row) => {
    const el = $(row);
    const link = el.find(APPLY_LINK).first();
    const href = link.attr('href')?.trim();
    if (!href) return;

    const cells = el.find('td');
    jobs.push({
      title: link.text(),
      url: href,
      location: cells.length >= 2 ? cells.eq(1).text() : null,
      nativeId: lastPathSegment(href),
    });
  });

  return jobs;
}

export class TalonLpeAdapter implements SourceAdapter {
  readonly name = 'talon-lpe';
  readonly company = 'Talon/LPE';
  readonly source = 'Talon/LPE';
  readonly baseUrl = LIST_URL;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    return withBrowserPage('TalonLPE', context, async page => {
      await page.goto(LIST_URL, { waitUntil: 'networkidle', timeout: 60_000 });
      await acceptCookies(page, 'TalonLPE');

      try {
        await page.waitForSelector(APPLY_LINK, { timeout: 20_000 });
      } catch {
        console.log('[TalonLPE] No TeamEngine postings on the page');
        return [];
      }

      const jobs = parseTalonRows(await page.content());
      console.log(`[TalonLPE] Extracted ${jobs.length} postings`);
      return jobs;
    });
  }
}
