import { load } from 'cheerio';
import type { RawJobRecord, ScrapeContext, SourceAdapter } from './types';
import { fetchHtml } from './common';
import { cleanText } from '../pipeline/text';
import { errorMessage } from '../errors';

const LIST_URL = 'https://www.disco-inc.com/careers';

type CheerioRoot = ReturnType<typeof load>;
type CheerioSelection = ReturnType<CheerioRoot>;

/** Striven postings carry a GUID in the LinkID query parameter. */
export function extractStrivenId(url: string): string | null {
  try {
    const params = new URL(url).searchParams;
    return params.get('LinkID') ?? params.get('linkid');
  } catch {
    return null;
  }
}

/** Non-empty text nodes in document order. */
function textNodes($: CheerioRoot, selection: CheerioSelection, out: string[] = []): string[] {
  selection.contents().each((_, node) => {
    const child = $(node);
    if (child.contents().length > 0) {
      textNodes($, child, out);
      return;
    }
    const text = cleanText(child.text());
    if (text) out.push(text);
  });
  return out;
}

function valueAfterLabel(texts: readonly string[], label: RegExp): string | null {
  for (let i = 0; i < texts.length; i++) {
    const match = texts[i].match(label);
    if (!match) continue;
    const inline = match[1]?.trim();
    if (inline) return inline;
    return texts[i + 1] ?? null;
  }
  return null;
}

/**
 * Title comes from a "Job Title:" label when present, otherwise from the page
 * heading with its "Apply - " prefix removed. Location only from a
 * "Location:" label.
 */
export function parseStrivenDetail(html: string): { title: string | null; location: string | null } {
  const $ = load(html);
  $('script, style, noscript').remove();
  const texts = textNodes($, $.root());

  let title = valueAfterLabel(texts, /^Job\s+Title\s*(?::\s*(.*))?$/i);
  if (!title) {
    const heading = cleanText($('h1').first().text()) ?? cleanText($('h2').first().text());
    if (heading) {
      title = heading.replace(/^Apply\s*-\s*/i, '').trim() || heading;
    }
  }

  return { title, location: valueAfterLabel(texts, /^Location\s*(?::\s*(.*))?$/i) };
}

export function findStrivenLinks(html: string, pageUrl: string = LIST_URL): { url: string; nativeId: string | null }[] {
  const $ = load(html);
  const links: { url: string; nativeId: string | null }[] = [];
  const seenIds = new Set<string>();

  $('a[href*="share.striven.com/Job"]').each((_, a) => {
    const href = $(a).attr('href')?.trim();
    if (!href) return;

    const url = new URL(href, pageUrl).href;
    const nativeId = extractStrivenId(url);
    if (nativeId) {
      if (seenIds.has(nativeId)) return;
      seenIds.add(nativeId);
    }
    links.push({ url, nativeId });
  });

  return links;
}

export class DiscoAdapter implements SourceAdapter {
  readonly name = 'disco';
  readonly company = 'DISCO Inc.';
  readonly source = 'DISCO Inc.';
  readonly baseUrl = LIST_URL;

  async scrape(context: ScrapeContext): Promise<RawJobRecord[]> {
    console.log('[DISCO] Fetching careers page...');
    const html = await fetchHtml(LIST_URL, { signal: context.signal, referer: LIST_URL });
    const links = findStrivenLinks(html);
    console.log(`[DISCO] Found ${links.length} Striven postings, fetching details...`);

    const jobs: RawJobRecord[] = [];
    for (const link of links) {
      let detail: { title: string | null; location: string | null };
      try {
        detail = parseStrivenDetail(await fetchHtml(link.url, { signal: context.signal }));
      } catch (error) {
        if (context.signal.aborted) throw error;
        console.error(`[DISCO] Failed to fetch ${link.url}: ${errorMessage(error)}`);
        continue;
      }
      if (!detail.title) continue;

      jobs.push({ title: detail.title, location: detail.location, url: link.url, nativeId: link.nativeId });
    }

    console.log(`[DISCO] Scrape complete. ${jobs.length} jobs`);
    return jobs;
  }
}
