import { z } from 'zod';
import type { Snapshot } from '../pipeline/types';

const requiredText = z.string().refine(value => value.trim().length > 0, 'must not be empty');

// Unknown keys pass through so newer writers can add fields.
export const canonicalJobSchema = z
  .object({
    id: requiredText,
    title: requiredText,
    company: requiredText,
    location: z.string().nullable(),
    salary: z.string().nullable(),
    url: requiredText,
    scraped_at: z.string(),
    source: z.string(),
    posted_at: z.string().nullable().optional(),
    employment_type: z.string().nullable().optional(),
  })
  .passthrough();

export const snapshotSchema = z.array(canonicalJobSchema);

function parseJsonLines(text: string): unknown[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean)
    .map((line): unknown => JSON.parse(line));
}

/**
 * Parses a snapshot document. A JSON array is expected; newline-delimited
 * objects are accepted too. Throws on anything that does not validate.
 */
export function parseSnapshot(text: string): Snapshot {
  if (!text.trim()) return [];

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    data = parseJsonLines(text);
  }

  return snapshotSchema.parse(data);
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return `${JSON.stringify(snapshot, null, 2)}\n`;
}
