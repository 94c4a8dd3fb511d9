import { describe, it, expect } from 'vitest';
import { extractBrassRingJobId, parseBrassRingCards, preferAmarillo } from './ttuhsc';

const DETAIL =
  'https://sjobs.brassring.com/TGnewUI/Search/home/HomeWithPreLoad?partnerid=25898&siteid=5283&PageType=JobDetails&jobid=98765';

describe('extractBrassRingJobId', () => {
  it('reads the jobid query parameter', () => {
    expect(extractBrassRingJobId(DETAIL)).toBe('98765');
    expect(extractBrassRingJobId('https://sjobs.brassring.com/TGnewUI/Search/Home/Home')).toBeNull();
  });
});

describe('parseBrassRingCards', () => {
  it('reads cards with a title link', () => {
    const html = `
      <div class="liner lightBorder">
        <a class="jobProperty jobtitle" href="${DETAIL.replace(/&/g, '&amp;')}">Nurse Educator</a>
        <p class="jobProperty position1">Amarillo, TX</p>
      </div>
      <div class="liner lightBorder"><p>Saved searches</p></div>`;

    expect(parseBrassRingCards(html)).toEqual([
      { title: 'Nurse Educator', url: DETAIL, location: 'Amarillo, TX', nativeId: '98765' },
    ]);
  });
});

describe('preferAmarillo', () => {
  it('keeps Amarillo postings when any are present', () => {
    const jobs = [
      { title: 'A', location: 'Amarillo, TX' },
      { title: 'B', location: 'Lubbock, TX' },
      { title: 'C', location: null },
    ];
    expect(preferAmarillo(jobs).map(job => job.title)).toEqual(['A']);
  });

  it('keeps everything when none mention Amarillo', () => {
    const jobs = [{ title: 'B', location: 'Lubbock, TX' }];
    expect(preferAmarillo(jobs)).toEqual(jobs);
  });
});
