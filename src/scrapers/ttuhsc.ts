import { load } from 'cheerio';
import type { Page } from 'playwright-core';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { uniqueBy } from './common';
import { acceptCookies, withBrowserPage } from './browser';
import { debug } from '../log';
import { errorMessage } from '../errors';

const BASE = 'https://sjobs.brassring.com';
const START_URL = `${BASE}/TGnewUI/Search/Home/Home?partnerid=25898&siteid=5283#Campus=HSC%20-%20Amarillo&keyWordSearch=`;
const CARD_SEL = 'div.liner.lightBorder';
const JOB_ANCHOR_SEL = `${CARD_SEL} a.jobProperty.jobtitle`;
const CAMPUS_LABEL = /HSC\s*[-–—]\s*Amarillo/i;
const MAX_PAGES = 10;

const KEYWORD_INPUTS = [
  'input#keywordsearch',
  "input[name='keywordsearch']",
  "input[ng-model*='Keyword']",
  "input[placeholder*='keyword' i]",
  "input[aria-label*='keyword' i]",
  "input[type='search']",
];

const NEXT_BUTTONS = [
  'a[aria-label="Next"]:not([aria-disabled="true"])',
  'button[aria-label="Next"]:not([disabled])',
  'li.paginationNext a',
  'a[title="Next"]',
  'button:has-text("Load more")',
  'button:has-text("Show more")',
];

export function extractBrassRingJobId(href: string): string | null {
  try {
    return new URL(href, BASE).searchParams.get('jobid');
  } catch {
    return href.match(/jobid=([^&#]+)/i)?.[1] ?? null;
  }
}

export function parseBrassRingCards(html: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  $(CARD_SEL).each((_, card) => {
    const el = $(card);
    const link = el.find('a.jobProperty.jobtitle').first();
    if (link.length === 0) return;

    const href = link.attr('href')?.trim() ?? '';
    jobs.push({
      title: link.text(),
      url: href,
      location: el.find('p.jobProperty.position1').first().text(),
      nativeId: href ? extractBrassRingJobId(href) : null,
    });
  });

  return jobs;
}

/** Keeps only Amarillo postings when the results mention Amarillo at all. */
export function preferAmarillo(jobs: readonly RawJobRecord[]): RawJobRecord[] {
  const inAmarillo = jobs.filter(job => typeof job.location === 'string' && /amarillo/i.test(job.location));
  return inAmarillo.length > 0 ? inAmarillo : [...jobs];
}

async function searchByKeyword(page: Page): Promise<void> {
  for (const selector of KEYWORD_INPUTS) {
    const input = page.locator(selector).first();
    if ((await input.count()) === 0) continue;
    try {
      await input.fill('');
      await input.pressSequentially('Amarillo, Texas');
      await input.press('Enter');
      await page.waitForSelector(JOB_ANCHOR_SEL, { timeout: 20_000 });
      return;
    } catch (error) {
      debug('TTUHSC', `Keyword search via ${selector} failed: ${errorMessage(error)}`);
    }
  }
}

async function openAdvancedSearch(page: Page): Promise<boolean> {
  try {
    await page.getByRole('link', { name: /^\s*Advanced Search\s*$/i }).click({ timeout: 7000 });
    return true;
  } catch (error) {
    debug('TTUHSC', `Advanced Search link by role: ${errorMessage(error)}`);
  }
  try {
    await page
      .locator('.powerSearchLink a.UnderLineLink', { hasText: /Advanced Search/i })
      .first()
      .click({ timeout: 7000 });
    return true;
  } catch (error) {
    debug('TTUHSC', `Advanced Search link by class: ${errorMessage(error)}`);
    return false;
  }
}

/** Narrows results to the Amarillo campus, falling back to a keyword search. */
async function applyAmarilloFilter(page: Page): Promise<void> {
  if (!(await openAdvancedSearch(page))) {
    await searchByKeyword(page);
    return;
  }

  try {
    await page.waitForSelector('label.checkboxLabel', { timeout: 10_000 });
  } catch {
    console.log('[TTUHSC] Advanced search panel did not load, using keyword search');
    await searchByKeyword(page);
    return;
  }

  try {
    await page.getByLabel(CAMPUS_LABEL).check({ timeout: 8000, force: true });
  } catch (error) {
    debug('TTUHSC', `Campus checkbox by label: ${errorMessage(error)}`);
    const label = page.locator('label.checkboxLabel', { hasText: CAMPUS_LABEL }).first();
    await label.scrollIntoViewIfNeeded();
    await label.click({ timeout: 8000 });
  }

  for (const name of ['Search', 'Apply', 'Done', 'Update', 'Go']) {
    try {
      await page.getByRole('button', { name: new RegExp(`^\\s*${name}\\s*$`, 'i') }).click({ timeout: 3000 });
      break;
    } catch (error) {
      debug('TTUHSC', `No "${name}" button: ${errorMessage(error)}`);
    }
  }

  await page.waitForSelector(JOB_ANCHOR_SEL, { timeout: 20_000 });
}

async function goToNextPage(page: Page): Promise<boolean> {
  const previousCount = await page.locator(JOB_ANCHOR_SEL).count();

  for (const selector of NEXT_BUTTONS) {
    const button = page.locator(selector).first();
    if ((await button.count()) === 0) continue;
    try {
      await button.click();
    } catch (error) {
      debug('TTUHSC', `Pager ${selector} not clickable: ${errorMessage(error)}`);
      continue;
    }
    try {
      await page.waitForFunction(
        ([sel, prev]) => document.querySelectorAll(sel).length > prev,
        [JOB_ANCHOR_SEL, previousCount] as const,
        { timeout: 10_000 },
      );
    } catch {
      await page.waitForSelector(JOB_ANCHOR_SEL, { timeout: 10_000 });
    }
    return true;
  }
  return false;
}

export class TtuhscAdapter implements SourceAdapter {
  readonly name = 'ttuhsc';
  readonly company = 'Texas Tech University Health Sciences Center';
  readonly source = 'TTUHSC';
  readonly baseUrl = BASE;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    const jobs = await withBrowserPage(
      'TTUHSC',
      context,
      async page => {
        page.setDefaultNavigationTimeout(60_000);
        try {
          await page.goto(START_URL, { waitUntil: 'domcontentloaded' });
        } catch (error) {
          console.error(`[TTUHSC] domcontentloaded timed out, retrying on load: ${errorMessage(error)}`);
          await page.goto(START_URL, { waitUntil: 'load' });
        }
        await acceptCookies(page, 'TTUHSC', /Accept|Agree|OK|Got it|I Accept|Close/i, 2500);

        try {
          await applyAmarilloFilter(page);
        } catch (error) {
          console.error(`[TTUHSC] Campus filter failed: ${errorMessage(error)}`);
        }

        try {
          await page.waitForSelector(JOB_ANCHOR_SEL, { timeout: 25_000 });
        } catch {
          console.log('[TTUHSC] No results rendered');
          return [];
        }

        // Load-more pagers keep earlier cards in the DOM, so each pass re-reads
        // the whole list and dedupe happens at the end.
        const found: RawJobRecord[] = [];
        let seenTotal = 0;
        for (let pageIndex = 1; pageIndex <= MAX_PAGES; pageIndex++) {
          const pageJobs = parseBrassRingCards(await page.content());
          if (pageJobs.length === 0) break;
          found.push(...pageJobs);

          const total = uniqueBy(found, job => `${String(job.nativeId)}|${String(job.url)}`).length;
          if (total === seenTotal) break;
          seenTotal = total;

          if (!(await goToNextPage(page))) break;
        }
        return found;
      },
      { args: ['--no-sandbox'] },
    );

    const unique = uniqueBy(preferAmarillo(jobs), job => `${String(job.nativeId)}|${String(job.url)}`);
    console.log(`[TTUHSC] Scrape complete. ${unique.length} postings`);
    return unique;
  }
}
