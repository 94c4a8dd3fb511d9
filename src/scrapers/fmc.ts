import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { delay, fetchHtml, uniqueBy } from './common';
import { firstNonEmpty } from './strategies';
import { cleanText } from '../pipeline/text';
import { errorMessage } from '../errors';

const BASE = 'https://www.paycomonline.net';
const CLIENT_KEY = '51CCB437D1A5BB8EA54B11A3C07895CA';
const LIST_URL = `${BASE}/v4/ats/web.php/jobs?clientkey=${CLIENT_KEY}`;
const DETAIL_PATH = '/v4/ats/web.php/jobs/ViewJobDetails';
const MAX_PAGES = 10;
const PAGE_DELAY_MS = 1000;

type CheerioRoot = ReturnType<typeof load>;
type CheerioSelection = ReturnType<CheerioRoot>;

export interface PaycomLocationLine {
  jobType: string | null;
  department: string | null;
  city: string | null;
  state: string | null;
  postalCode: string | null;
  place: string;
}

/** Splits `Full Time | Service - Amarillo, TX, 79118` into its parts. */
export function parseLocationLine(text: string): PaycomLocationLine {
  const line = text.trim();

  let jobType: string | null = null;
  let rest = line;
  const pipe = line.indexOf('|');
  if (pipe >= 0) {
    jobType = line.slice(0, pipe).trim() || null;
    rest = line.slice(pipe + 1).trim();
  }

  let department: string | null = null;
  let place = rest;
  const dash = rest.indexOf(' - ');
  if (dash >= 0) {
    department = rest.slice(0, dash).trim() || null;
    place = rest.slice(dash + 3).trim();
  }

  const m = place.match(/([^,]+),\s*([A-Z]{2})(?:,\s*(\d{5}))?$/);
  return {
    jobType,
    department,
    city: m ? m[1].trim() : null,
    state: m ? m[2] : null,
    postalCode: m?.[3] ?? null,
    place: place || line,
  };
}

export function extractPaycomJobId(url: string): string | null {
  try {
    return new URL(url, BASE).searchParams.get('job');
  } catch {
    return null;
  }
}

function toRecord(fields: {
  nativeId: string | null;
  title: string | null;
  url: string;
  locationLine: string;
  snippet?: string | null;
}): RawJobRecord {
  const loc = parseLocationLine(fields.locationLine);
  return {
    nativeId: fields.nativeId,
    title: fields.title,
    url: fields.url,
    employmentType: loc.jobType,
    department: loc.department,
    city: loc.city,
    state: loc.state,
    postalCode: loc.postalCode,
    location: loc.place,
    snippet: fields.snippet ? fields.snippet.slice(0, 400) : null,
  };
}

function selectCards($: CheerioRoot): CheerioSelection {
  const items = $('li.jobInfo.JobListing');
  if (items.length > 0) return items;
  const alt = $("li.JobListing, li.jobListing, li[class*='JobListing']");
  if (alt.length > 0) return alt;
  return $("a.JobListing__container[href*='ViewJobDetails'], a[href*='ViewJobDetails?']");
}

export function parseFmcCards(html: string): RawJobRecord[] {
  const $ = load(html);
  const jobs: RawJobRecord[] = [];

  selectCards($).each((_, node) => {
    const card = $(node);
    const isAnchor = card.is('a');
    const link = isAnchor
      ? card
      : card.find('a.JobListing__container[href]').first().add(card.find("a[href*='ViewJobDetails']")).first();
    const href = link.attr('href');
    if (!href) return;

    const url = new URL(href, BASE).href;
    const titleEl = isAnchor ? card : card.find('span.jobInfoLine.jobTitle').first();
    const title = cleanText(titleEl.length > 0 ? titleEl.text() : link.text());

    jobs.push(
      toRecord({
        nativeId: extractPaycomJobId(url),
        title,
        url,
        locationLine: cleanText(card.find('span.jobInfoLine.jobLocation').first().text()) ?? '',
        snippet: cleanText(card.find('span.jobInfoLine.jobDescription').first().text()),
      }),
    );
  });

  return jobs;
}

export function findJobIdsInHtml(html: string): string[] {
  const ids = new Set<string>();
  for (const m of html.matchAll(/ViewJobDetails[^"'>]+?job=(\d+)/g)) {
    ids.add(m[1]);
  }
  return [...ids];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function textAfterLabel($: CheerioRoot, label: string): string {
  const pattern = new RegExp('^\\s*' + escapeRegExp(label) + '\\b', 'i');
  const labelEl = $('body *')
    .filter((_, el) => {
      const node = $(el);
      return node.children().length === 0 && pattern.test(node.text());
    })
    .first();
  if (labelEl.length === 0) return '';
  return cleanText(labelEl.next().text()) ?? '';
}

export function parseFmcDetail(html: string, jobId: string): RawJobRecord {
  const $ = load(html);
  const title = cleanText($('h1').first().text()) ?? cleanText($('h2').first().text());
  const record = toRecord({
    nativeId: jobId,
    title,
    url: `${BASE}${DETAIL_PATH}?clientkey=${CLIENT_KEY}&job=${jobId}`,
    locationLine: textAfterLabel($, 'Job Location'),
  });
  const positionType = cleanText(textAfterLabel($, 'Position Type'));
  return positionType ? { ...record, employmentType: positionType } : record;
}

export class FmcAdapter implements SourceAdapter {
  readonly name = 'fmc';
  readonly company = 'FMC';
  readonly source = 'FMC';
  readonly baseUrl = BASE;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    let fallbackIds: string[] = [];

    const jobs = await firstNonEmpty<RawJobRecord>('FMC', [
      {
        name: 'list pages',
        run: async () => {
          const found: RawJobRecord[] = [];
          for (let page = 1; page <= MAX_PAGES; page++) {
            if (page > 1) await delay(PAGE_DELAY_MS);
            const url = page === 1 ? LIST_URL : `${LIST_URL}&page=${page}`;
            console.log(`[FMC] Fetching page ${page}...`);
            const html = await fetchHtml(url, { signal: context.signal, referer: LIST_URL });
            const cards = parseFmcCards(html);

            if (cards.length === 0) {
              if (page === 1) fallbackIds = findJobIdsInHtml(html);
              break;
            }

            const before = uniqueBy(found, job => String(job.nativeId ?? job.url)).length;
            found.push(...cards);
            if (uniqueBy(found, job => String(job.nativeId ?? job.url)).length === before) break;
          }
          return found;
        },
      },
      {
        name: 'detail pages',
        run: async () => {
          const found: RawJobRecord[] = [];
          for (const jobId of fallbackIds) {
            const url = `${BASE}${DETAIL_PATH}?clientkey=${CLIENT_KEY}&job=${jobId}`;
            try {
              found.push(parseFmcDetail(await fetchHtml(url, { signal: context.signal, referer: LIST_URL }), jobId));
            } catch (error) {
              if (context.signal.aborted) throw error;
              console.error(`[FMC] Detail ${jobId} failed: ${errorMessage(error)}`);
            }
          }
          return found;
        },
      },
    ]);

    const unique = uniqueBy(jobs, job => String(job.nativeId ?? job.url));
    console.log(`[FMC] Scrape complete. ${unique.length} jobs`);
    return unique;
  }
}
