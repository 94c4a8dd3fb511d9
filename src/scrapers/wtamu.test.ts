import { describe, it, expect } from 'vitest';
import { cleanWorkdayLocation, extractRequisitionId, normalizeWorkdayHref, parseWorkdayList } from './wtamu';

const BASE = 'https://tamus.wd1.myworkdayjobs.com';
const PAGE = `${BASE}/en-US/WTAMU_External`;

describe('normalizeWorkdayHref', () => {
  it('builds a standalone posting URL', () => {
    expect(normalizeWorkdayHref('/en-US/WTAMU_External/job/Canyon-TX/Lab-Tech_R-12345?q=1', PAGE)).toBe(
      `${BASE}/en-US/WTAMU_External/job/Canyon-TX/Lab-Tech_R-12345`,
    );
    expect(normalizeWorkdayHref('./job/Canyon/Coach_R-2', PAGE)).toBe(`${BASE}/en-US/WTAMU_External/job/Canyon/Coach_R-2`);
    expect(normalizeWorkdayHref('//cdn.example.com/x#top', PAGE)).toBe('https://cdn.example.com/x');
    expect(normalizeWorkdayHref('WTAMU_External/job/B', PAGE)).toBe(`${BASE}/WTAMU_External/job/B`);
  });

  it('falls back to the page URL for an empty href', () => {
    expect(normalizeWorkdayHref('', PAGE)).toBe(PAGE);
    expect(normalizeWorkdayHref(null, PAGE)).toBe(PAGE);
  });
});

describe('extractRequisitionId', () => {
  it('finds R- numbers', () => {
    expect(extractRequisitionId('R-12345-1 | Posted Today')).toBe('R-12345-1');
    expect(extractRequisitionId('Posted Yesterday')).toBeNull();
  });
});

describe('cleanWorkdayLocation', () => {
  it('drops the Locations prefix', () => {
    expect(cleanWorkdayLocation('Locations  Canyon, TX')).toBe('Canyon, TX');
    expect(cleanWorkdayLocation('Locations')).toBeNull();
    expect(cleanWorkdayLocation(null)).toBeNull();
  });
});

describe('parseWorkdayList', () => {
  it('reads title, location and requisition id from each item', () => {
    const html = `
      <ul role="list">
        <li class="css-1q2dra3">
          <h3><a data-automation-id="jobTitle" href="/en-US/WTAMU_External/job/Canyon-TX/Lab-Tech_R-12345">Lab Tech</a></h3>
          <div data-automation-id="locations">Locations Canyon, TX</div>
          <ul data-automation-id="subtitle"><li>R-12345</li></ul>
        </li>
        <li class="css-1q2dra3">
          <h3><a data-automation-id="jobTitle" href="/en-US/WTAMU_External/job/Amarillo-TX/Instructor_JR7">Instructor</a></h3>
        </li>
      </ul>`;

    expect(parseWorkdayList(html, PAGE)).toEqual([
      {
        title: 'Lab Tech',
        url: `${BASE}/en-US/WTAMU_External/job/Canyon-TX/Lab-Tech_R-12345`,
        location: 'Canyon, TX',
        nativeId: 'R-12345',
      },
      {
        title: 'Instructor',
        url: `${BASE}/en-US/WTAMU_External/job/Amarillo-TX/Instructor_JR7`,
        location: null,
        nativeId: 'Instructor_JR7',
      },
    ]);
  });
});
