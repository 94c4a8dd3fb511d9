import { describe, it, expect } from 'vitest';
import { cleanText } from './text';

describe('cleanText', () => {
  it('collapses whitespace including non-breaking spaces', () => {
    expect(cleanText('  Parts\n\t Counter\u00a0 Sales ')).toBe('Parts Counter Sales');
  });

  it('decodes entities and drops tags', () => {
    expect(cleanText('R&amp;D <b>Technician</b> &ndash; Night')).toBe('R&D Technician – Night');
  });

  it('accepts finite numbers', () => {
    expect(cleanText(1234)).toBe('1234');
    expect(cleanText(Number.NaN)).toBeNull();
  });

  it('returns null for empty and non-text values', () => {
    expect(cleanText('   ')).toBeNull();
    expect(cleanText(null)).toBeNull();
    expect(cleanText(undefined)).toBeNull();
    expect(cleanText({ title: 'x' })).toBeNull();
  });
});
