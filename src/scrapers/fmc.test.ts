import { describe, it, expect } from 'vitest';
import { findJobIdsInHtml, parseFmcCards, parseFmcDetail, parseLocationLine, FmcAdapter } from './fmc';
import { normalizeJob } from '../pipeline/normalize';

describe('parseLocationLine', () => {
  it('splits type, department and place', () => {
    expect(parseLocationLine('Full Time | Service - Amarillo, TX, 79118')).toEqual({
      jobType: 'Full Time',
      department: 'Service',
      city: 'Amarillo',
      state: 'TX',
      postalCode: '79118',
      place: 'Amarillo, TX, 79118',
    });
  });

  it('handles a bare place', () => {
    expect(parseLocationLine('Lubbock, TX')).toEqual({
      jobType: null,
      department: null,
      city: 'Lubbock',
      state: 'TX',
      postalCode: null,
      place: 'Lubbock, TX',
    });
  });
});

describe('parseFmcCards', () => {
  const html = `
    <ul>
      <li class="jobInfo JobListing">
        <a class="JobListing__container" href="/v4/ats/web.php/jobs/ViewJobDetails?job=555&amp;clientkey=51CC">
          <span class="jobInfoLine jobTitle">Field Service Tech</span>
        </a>
        <span class="jobInfoLine jobLocation">Full Time | Service - Amarillo, TX, 79118</span>
        <span class="jobInfoLine jobDescription">Repair equipment.</span>
      </li>
    </ul>`;

  it('reads each card', () => {
    expect(parseFmcCards(html)).toEqual([
      {
        nativeId: '555',
        title: 'Field Service Tech',
        url: 'https://www.paycomonline.net/v4/ats/web.php/jobs/ViewJobDetails?job=555&clientkey=51CC',
        employmentType: 'Full Time',
        department: 'Service',
        city: 'Amarillo',
        state: 'TX',
        postalCode: '79118',
        location: 'Amarillo, TX, 79118',
        snippet: 'Repair equipment.',
      },
    ]);
  });

  it('normalizes to a city and state location', () => {
    const [raw] = parseFmcCards(html);
    const job = normalizeJob(raw, new FmcAdapter(), new Date('2026-10-19T06:00:00Z'));
    expect(job?.location).toBe('Amarillo, TX');
    expect(job?.employment_type).toBe('Full Time');
    expect(job?.id).toBe('fmc-555-field-service-tech');
  });
});

describe('findJobIdsInHtml', () => {
  it('finds distinct job ids in detail links', () => {
    const html = `
      <a href="/v4/ats/web.php/jobs/ViewJobDetails?clientkey=X&amp;job=77">One</a>
      <a href="/v4/ats/web.php/jobs/ViewJobDetails?clientkey=X&amp;job=77">One again</a>
      <a href='/v4/ats/web.php/jobs/ViewJobDetails?job=88'>Two</a>`;
    expect(findJobIdsInHtml(html)).toEqual(['77', '88']);
  });
});

describe('parseFmcDetail', () => {
  it('reads the labelled fields of a detail page', () => {
    const html = `
      <h1>Welder</h1>
      <div><span>Job Location</span><span>Full Time | Fabrication - Amarillo, TX, 79107</span></div>
      <div><span>Position Type</span><span>Full Time</span></div>`;

    expect(parseFmcDetail(html, '42')).toMatchObject({
      nativeId: '42',
      title: 'Welder',
      url: 'https://www.paycomonline.net/v4/ats/web.php/jobs/ViewJobDetails?clientkey=51CCB437D1A5BB8EA54B11A3C07895CA&job=42',
      employmentType: 'Full Time',
      city: 'Amarillo',
      state: 'TX',
    });
  });
});
