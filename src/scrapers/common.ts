export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

const FETCH_TIMEOUT_MS = 20_000;

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface FetchHtmlOptions {
  signal?: AbortSignal;
  referer?: string;
  timeoutMs?: number;
}

export async function fetchHtml(url: string, options: FetchHtmlOptions = {}): Promise<string> {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? FETCH_TIMEOUT_MS);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  const response = await fetch(url, {
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      ...(options.referer ? { Referer: options.referer } : {}),
    },
    redirect: 'follow',
    signal,
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} on ${url}`);
  }
  return response.text();
}

/** Keeps the first item for each key. */
export function uniqueBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  const result: T[] = [];
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) continue;
    seen.add(k);
    result.push(item);
  }
  return result;
}

/** Last non-empty path segment of a URL, ignoring query and hash. */
export function lastPathSegment(url: string): string | null {
  const path = url.split(/[?#]/, 1)[0].replace(/\/+$/, '');
  const segment = path.slice(path.lastIndexOf('/') + 1);
  return segment || null;
}
