import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { lastPathSegment, uniqueBy } from './common';
import { acceptCookies, withBrowserPage } from './browser';
import { cleanText } from '../pipeline/text';

const BASE = 'https://tamus.wd1.myworkdayjobs.com';
const SITE = 'WTAMU_External';
const START_URLS = [`${BASE}/en-US/${SITE}`, `${BASE}/${SITE}`];
const MAX_PAGES = 10;
const TITLE_LINK = 'a[data-automation-id="jobTitle"]';

export function extractRequisitionId(text: string): string | null {
  return text.match(/\b(R-\d+(?:-\d+)?)\b/)?.[1] ?? null;
}

export function cleanWorkdayLocation(value: string | null | undefined): string | null {
  const text = cleanText(value);
  if (!text) return null;
  return text.replace(/^locations?\s*/i, '') || null;
}

/**
 * Turns a list-page href into a standalone posting URL. Workday's client-side
 * routes open a sidebar; query and hash are dropped to get the detail page.
 */
export function normalizeWorkdayHref(href: string | null | undefined, pageUrl: string): string {
  let h = href?.trim() ?? '';
  if (!h) return pageUrl;
  if (h.startsWith('./')) h = h.slice(2);

  let url: string;
  if (/^https?:\/\//i.test(h)) url = h;
  else if (h.startsWith('//')) url = `https:${h}`;
  else if (h.startsWith('/')) url = `${BASE}${h}`;
  else if (h.startsWith('job/')) url = `${BASE}/en-US/${SITE}/${h}`;
  else url = `${BASE}/${h}`;

  return url.split('?', 1)[0].split('#', 1)[0];
}

export function parseWorkdayList(html: string, pageUrl: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $(TITLE_LINK).each((_, anchor) => {
    const el = $(anchor);
    const href = el.attr('href')?.trim() ?? '';
    const item = el.closest('li');
    const subtitle = item.find('ul[data-automation-id="subtitle"] li').first().text();

    jobs.push({
      title: el.text(),
      url: normalizeWorkdayHref(href, pageUrl),
      location: cleanWorkdayLocation(item.find('[data-automation-id="locations"]').first().text()),
      nativeId: extractRequisitionId(subtitle) ?? (href ? lastPathSegment(href) : null),
    });
  });

  return jobs;
}

export class WtamuAdapter implements SourceAdapter {
  readonly name = 'wtamu';
  readonly company = 'West Texas A&M University';
  readonly source = 'WTAMU';
  readonly baseUrl = BASE;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    const jobs = await withBrowserPage('WTAMU', context, async page => {
      const found: RawJobRecord[] = [];

      for (const start of START_URLS) {
        for (let pageNum = 1; pageNum <= MAX_PAGES; pageNum++) {
          const url = pageNum === 1 ? start : `${start}?page=${pageNum}`;
          console.log(`[WTAMU] Loading ${url}`);
          await page.goto(url, { waitUntil: 'networkidle', timeout: 60_000 });
          await acceptCookies(page, 'WTAMU', /Accept|Agree|OK/i, 2500);

          try {
            await page.waitForSelector(TITLE_LINK, { timeout: 20_000 });
          } catch {
            console.log(`[WTAMU] No postings on page ${pageNum}`);
            break;
          }

          const pageJobs = parseWorkdayList(await page.content(), page.url());
          if (pageJobs.length === 0) break;
          found.push(...pageJobs);
        }
        if (found.length > 0) break;
      }

      return found;
    });

    const unique = uniqueBy(jobs, job => `${String(job.nativeId)}|${String(job.url)}`);
    console.log(`[WTAMU] Scrape complete. ${unique.length} postings`);
    return unique;
  }
}
