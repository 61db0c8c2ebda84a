import { describe, expect, it } from 'vitest';
import { discoverClubs } from '../discover.js';
import { ExtractionError } from '../errors.js';
import { readFixture, testLeague } from './helpers.js';

describe('discoverClubs', () => {
  it('lists each club once with its crest title as the name', () => {
    expect(discoverClubs(readFixture('league-overview.html'), testLeague)).toEqual([
      { id: '101', name: 'Northbridge FC', slug: 'northbridge-fc' },
      { id: '202', name: 'Harbor City', slug: 'harbor-city' },
      { id: '303', name: 'Eastvale United', slug: 'eastvale-united' }
    ]);
  });

  it('falls back to the link text and accepts absolute links', () => {
    const html = `<table class="items"><tbody><tr>
      <td><a href="https://tm.test/westport-rovers/startseite/verein/404/saison_id/2024">Westport Rovers</a></td>
    </tr></tbody></table>`;

    expect(discoverClubs(html, testLeague)).toEqual([{ id: '404', name: 'Westport Rovers', slug: 'westport-rovers' }]);
  });

  it('fails when the page has no club table', () => {
    expect(() => discoverClubs('<html><body><p>Maintenance</p></body></html>', testLeague)).toThrow(ExtractionError);
  });

  it('fails when the club table links no clubs', () => {
    const html = '<table class="items"><tbody><tr><td><a href="/x/kader/verein/1">1</a></td></tr></tbody></table>';
    try {
      discoverClubs(html, testLeague);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExtractionError);
      expect(error instanceof ExtractionError && error.code).toBe('CLUB_TABLE_NOT_FOUND');
    }
  });
});
