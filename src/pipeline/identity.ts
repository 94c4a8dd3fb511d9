import { createHash } from 'crypto';

export const MAX_SLUG_ID_LENGTH = 90;

export interface IdentityInput {
  source: string;
  title: string;
  company: string;
  location: string | null;
  /** Platform job id, requisition number, GUID pulled from the posting URL... */
  nativeId?: string | null;
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function canonicalSegment(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(/\s+/g, ' ').trim();
}

/** Whitespace is collapsed in every segment; only the title is case-folded. */
export function contentKey(title: string, company: string, location: string | null): string {
  return [canonicalSegment(title).toLowerCase(), canonicalSegment(company), canonicalSegment(location)].join('|');
}

/**
 * Stable id for a posting. A native id yields a readable slug
 * (`austin-hose-1234-diesel-mechanic`); without one the id is the SHA-1 of
 * `title|company|location` with whitespace collapsed and the title case-folded.
 */
export function resolveJobId(input: IdentityInput): string {
  const nativeId = input.nativeId?.trim();
  if (nativeId) {
    const slug = slugify(`${input.source}-${nativeId}-${canonicalSegment(input.title)}`);
    return slug.slice(0, MAX_SLUG_ID_LENGTH).replace(/-+$/, '');
  }

  return createHash('sha1')
    .update(contentKey(input.title, input.company, input.location))
    .digest('hex');
}
