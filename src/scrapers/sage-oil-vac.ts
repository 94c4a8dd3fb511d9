import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { fetchHtml } from './common';
import { withBrowserPage } from './browser';
import { firstNonEmpty } from './strategies';
import { errorMessage } from '../errors';

const LIST_URL = 'https://sageoilvac.isolvedhire.com/jobs/';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordsOf(value: unknown): RawJobRecord[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function findTitledList(value: unknown): RawJobRecord[] {
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    if (isRecord(first) && 'title' in first) return recordsOf(value);
    for (const item of value) {
      const hit = findTitledList(item);
      if (hit.length > 0) return hit;
    }
  } else if (isRecord(value)) {
    for (const item of Object.values(value)) {
      const hit = findTitledList(item);
      if (hit.length > 0) return hit;
    }
  }
  return [];
}

/**
 * Pulls the job list out of a Next.js `__NEXT_DATA__` payload:
 * `props.pageProps.positions`, then `props.pageProps.data.positions`, then the
 * first array anywhere whose first element has a `title`.
 */
export function extractPositions(data: unknown): RawJobRecord[] {
  const props = isRecord(data) ? data.props : undefined;
  const pageProps = isRecord(props) ? props.pageProps : undefined;
  if (isRecord(pageProps)) {
    const direct = recordsOf(pageProps.positions);
    if (direct.length > 0) return direct;
    const nested = isRecord(pageProps.data) ? recordsOf(pageProps.data.positions) : [];
    if (nested.length > 0) return nested;
  }
  return findTitledList(data);
}

export function parseNextData(html: string): RawJobRecord[] {
  const $ = load(html);
  // .text() skips script bodies; .html() returns them raw.
  const payload = $('script#__NEXT_DATA__').first().html() ?? '';
  if (!payload.trim()) return [];

  let data: unknown;
  try {
    data = JSON.parse(payload);
  } catch (error) {
    console.error(`[SageOilVac] Unreadable __NEXT_DATA__: ${errorMessage(error)}`);
    return [];
  }
  return extractPositions(data);
}

export class SageOilVacAdapter implements SourceAdapter {
  readonly name = 'sage-oil-vac';
  readonly company = 'Sage Oil Vac';
  readonly source = 'Sage Oil Vac';
  readonly baseUrl = LIST_URL;
  readonly fields = {
    title: ['title', 'name'],
    url: ['url', 'applyUrl'],
    salary: ['pay', 'compensation'],
    postedAt: ['posted', 'postDate'],
    employmentType: ['employment_type'],
    nativeId: ['id'],
  };

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    return firstNonEmpty<RawJobRecord>('SageOilVac', [
      {
        name: 'static page',
        run: async () => parseNextData(await fetchHtml(LIST_URL, { signal: context.signal })),
      },
      {
        name: 'rendered page',
        run: () =>
          withBrowserPage(
            'SageOilVac',
            context,
            async page => {
              await page.goto(LIST_URL, { waitUntil: 'domcontentloaded', timeout: 120_000 });
              // The Cloudflare check may never hand over; parse whatever rendered.
              await page.waitForSelector('#__NEXT_DATA__', { state: 'attached', timeout: 120_000 }).catch(
                (error: unknown) => {
                  console.error(`[SageOilVac] __NEXT_DATA__ did not appear: ${errorMessage(error)}`);
                },
              );
              return parseNextData(await page.content());
            },
            { args: ['--disable-blink-features=AutomationControlled'] },
          ),
      },
    ]);
  }
}
