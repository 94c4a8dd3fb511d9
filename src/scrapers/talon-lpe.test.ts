import { describe, it, expect } from 'vitest';
import { parseTalonRows } from './talon-lpe';

describe('parseTalonRows', () => {
  it('reads rows with a TeamEngine apply link', () => {
    const html = `
      <table>
        <tr><th>Position</th><th>Location</th></tr>
        <tr>
          <td><a href="https://apply.teamengine.io/apply/abc123">Lease Operator</a></td>
          <td>Pampa, TX</td>
        </tr>
        <tr><td>General application</td><td>Any</td></tr>
        <tr><td><a href="https://apply.teamengine.io/apply/def456/">Pumper</a></td></tr>
      </table>`;

    expect(parseTalonRows(html)).toEqual([
      {
        title: 'Lease Operator',
        url: 'https://apply.teamengine.io/apply/abc123',
        location: 'Pampa, TX',
        nativeId: 'abc123',
      },
      {
        title: 'Pumper',
        url: 'https://apply.teamengine.io/apply/def456/',
        location: null,
        nativeId: 'def456',
      },
    ]);
  });
});
