import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { fetchHtml } from './common';
import { cleanText } from '../pipeline/text';

const LIST_URL = 'https://www.anb.com/about-anb/careers.html';

// The careers page is CMS output: each region's openings sit between
// {beginAccordion ...} and {endAccordion} tokens, under an <h2> or "##" heading.
const BEGIN_RE = /\{beginAccordion[^}]*\}/gi;
const END_RE = /\{endAccordion\}/gi;
const ATTR_TITLE_RE = /(?:title|heading|label)\s*[:=]\s*(['"])(.*?)\1/i;

const REGION_H2_RE = /<h2[^>]*>([\s\S]*?)<\/h2>/gi;
const REGION_MD_RE = /^##(?!#)\s*([^\n<]+?)\s*$/gm;

const BUTTON_TITLE_RE = /<button[^>]*class="[^"]*accordion-button[^"]*"[^>]*>([\s\S]*?)<\/button>/gi;
const H3_TITLE_RE = /<h3[^>]*>([\s\S]*?)<\/h3>/gi;
const MD_TITLE_RE = /^###\s*([^\n<]+?)\s*$/gm;

function prepare(html: string): string {
  return html
    .replace(/\r\n?/g, '\n')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;|&apos;/g, "'")
    .replace(/&nbsp;|\u00a0/g, ' ');
}

function lastMatch(re: RegExp, text: string): string | null {
  let last: string | null = null;
  for (const m of text.matchAll(re)) {
    last = m[1];
  }
  return last;
}

export function nearestRegion(html: string, beforeIndex: number): string | null {
  const head = html.slice(0, beforeIndex);
  const h2 = lastMatch(REGION_H2_RE, head);
  if (h2 !== null) return cleanText(h2);
  const md = lastMatch(REGION_MD_RE, head);
  return md !== null ? cleanText(md) : null;
}

export function titlesFromBlock(block: string): string[] {
  const titles: string[] = [];
  for (const re of [BUTTON_TITLE_RE, H3_TITLE_RE, MD_TITLE_RE]) {
    for (const m of block.matchAll(re)) {
      const title = cleanText(m[1]);
      if (title && !titles.includes(title)) titles.push(title);
    }
  }
  return titles;
}

export function parseAnbAccordions(html: string): RawJobRecord[] {
  const raw = prepare(html);
  const jobs: RawJobRecord[] = [];

  BEGIN_RE.lastIndex = 0;
  let begin: RegExpExecArray | null;
  while ((begin = BEGIN_RE.exec(raw)) !== null) {
    const blockStart = begin.index + begin[0].length;
    END_RE.lastIndex = blockStart;
    const end = END_RE.exec(raw);
    if (!end) break;

    const attr = ATTR_TITLE_RE.exec(begin[0]);
    const region = attr ? cleanText(attr[2]) : nearestRegion(raw, begin.index);

    for (const title of titlesFromBlock(raw.slice(blockStart, end.index))) {
      jobs.push({
        title,
        region,
        url: LIST_URL,
        nativeId: region ?? 'anb',
      });
    }

    BEGIN_RE.lastIndex = end.index + end[0].length;
  }

  return jobs;
}

export class AnbAdapter implements SourceAdapter {
  readonly name = 'anb';
  readonly company = 'Amarillo National Bank';
  readonly source = 'Amarillo National Bank';
  readonly baseUrl = LIST_URL;
  // Region headings are city names in the bank's Texas footprint.
  readonly location = { defaultState: 'TX' };

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    console.log('[ANB] Fetching careers page...');
    const html = await fetchHtml(LIST_URL, { signal: context.signal, referer: LIST_URL });
    const jobs = parseAnbAccordions(html);
    console.log(`[ANB] Extracted ${jobs.length} openings`);
    return jobs;
  }
}
