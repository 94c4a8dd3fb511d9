import type { CanonicalJob, RawJobRecord } from './types';
import { resolveJobId } from './identity';
import { cleanText } from './text';

/** Prioritized raw keys for each canonical field. */
export interface FieldMap {
  title: string[];
  url: string[];
  nativeId: string[];
  location: string[];
  city: string[];
  state: string[];
  region: string[];
  salary: string[];
  postedAt: string[];
  employmentType: string[];
}

export const DEFAULT_FIELDS: FieldMap = {
  title: ['title'],
  url: ['url'],
  nativeId: ['nativeId'],
  location: ['location'],
  city: ['city'],
  state: ['state'],
  region: ['region'],
  salary: ['salary'],
  postedAt: ['postedAt'],
  employmentType: ['employmentType'],
};

export const DEFAULT_LOCATION_SUFFIXES = [', USA', ', United States', ', US'];

/**
 * Per-adapter location heuristics. `defaultState` is only applied when the
 * source gives a city or region with no state.
 */
export interface LocationPolicy {
  defaultState?: string;
  stripSuffixes?: string[];
}

export interface NormalizerProfile {
  company: string;
  source: string;
  baseUrl?: string;
  fields?: Partial<FieldMap>;
  location?: LocationPolicy;
}

export interface LocationParts {
  text?: string | null;
  city?: string | null;
  state?: string | null;
  region?: string | null;
}

const STATE_SUFFIX = /,\s*[A-Z]{2}$/;

export function formatScrapedAt(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export function pickString(raw: RawJobRecord, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = cleanText(raw[key]);
    if (value) return value;
  }
  return null;
}

/** Like pickString but verbatim apart from trimming; used for links and ids. */
export function pickRaw(raw: RawJobRecord, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

function stripSuffixes(text: string, suffixes: readonly string[]): string {
  let result = text;
  for (const suffix of suffixes) {
    if (result.toLowerCase().endsWith(suffix.toLowerCase())) {
      result = result.slice(0, result.length - suffix.length).trim();
    }
  }
  return result;
}

export function composeLocation(parts: LocationParts, policy: LocationPolicy = {}): string | null {
  const city = cleanText(parts.city);
  const state = cleanText(parts.state);
  if (city && state) {
    return `${city}, ${state}`;
  }

  const text = cleanText(parts.text);
  if (text) {
    const stripped = stripSuffixes(text, policy.stripSuffixes ?? DEFAULT_LOCATION_SUFFIXES);
    if (stripped) return stripped;
  }

  const place = city ?? cleanText(parts.region);
  if (place) {
    if (STATE_SUFFIX.test(place) || !policy.defaultState) return place;
    return `${place}, ${policy.defaultState}`;
  }

  return null;
}

const WEB_URL = /^https?:\/\//i;

/** Absolute http(s) links pass through untouched; other schemes are refused. */
export function resolveUrl(href: string, baseUrl?: string): string | null {
  if (WEB_URL.test(href)) return href;
  if (/^[a-z][a-z0-9+.-]*:/i.test(href) || !baseUrl) return null;
  try {
    const url = new URL(href, baseUrl).href;
    return WEB_URL.test(url) ? url : null;
  } catch {
    return null;
  }
}

/**
 * Maps one raw record to a CanonicalJob, or null when title, company or url
 * cannot be filled.
 */
export function normalizeJob(
  raw: RawJobRecord,
  profile: NormalizerProfile,
  now: Date = new Date(),
): CanonicalJob | null {
  const fields: FieldMap = { ...DEFAULT_FIELDS, ...profile.fields };

  const title = pickString(raw, fields.title);
  if (!title) return null;

  const company = cleanText(profile.company);
  if (!company) return null;

  const href = pickRaw(raw, fields.url);
  const url = href ? resolveUrl(href, profile.baseUrl) : null;
  if (!url) return null;

  const location = composeLocation(
    {
      text: pickString(raw, fields.location),
      city: pickString(raw, fields.city),
      state: pickString(raw, fields.state),
      region: pickString(raw, fields.region),
    },
    profile.location,
  );

  const job: CanonicalJob = {
    id: resolveJobId({
      source: profile.source,
      title,
      company,
      location,
      nativeId: pickRaw(raw, fields.nativeId),
    }),
    title,
    company,
    location,
    salary: pickString(raw, fields.salary),
    url,
    scraped_at: formatScrapedAt(now),
    source: profile.source,
  };

  const postedAt = pickString(raw, fields.postedAt);
  if (postedAt) job.posted_at = postedAt;
  const employmentType = pickString(raw, fields.employmentType);
  if (employmentType) job.employment_type = employmentType;

  return job;
}
