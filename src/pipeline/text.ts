import { load } from 'cheerio';

/**
 * Decodes HTML entities, strips stray markup and collapses whitespace
 * (including non-breaking spaces). Returns null for anything that ends up empty.
 */
export function cleanText(value: unknown): string | null {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    text = String(value);
  } else {
    return null;
  }

  if (/[&<]/.test(text)) {
    text = load(text, null, false).root().text();
  }
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed || null;
}
