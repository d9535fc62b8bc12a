/**
 * Unit tests for the league scrapers
 *
 * Parsing runs against the HTML fixtures; fetching goes through a stubbed
 * global fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import {
  EredivisieScraper,
  KkdScraper,
  cleanTeamName,
  createScrapers,
  fetchHtml,
  normalizeStandings,
  safeInt,
  splitInts,
} from '../src/scraper/index.js';
import { ParseError, UpstreamError } from '../src/errors.js';
import type { StandingRow } from '../src/types/index.js';

function loadFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

function buildTable(rows: string[][], className = 'standings'): string {
  const body = rows
    .map((cells) => `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`)
    .join('\n');
  return `<html><body><table class="${className}"><tbody>${body}</tbody></table></body></html>`;
}

function eredivisieRow(position: string, team: string): string[] {
  return [position, team, '10', '5 | 3 | 2', '15 - 10', '+5', '17'];
}

function row(position: number, team: string): StandingRow {
  return {
    position,
    team,
    played: 0,
    won: 0,
    drawn: 0,
    lost: 0,
    points: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    goalDifference: 0,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe('cell helpers', () => {
  it('cleans team names', () => {
    expect(cleanTeamName('  FC   Polderstad * ')).toBe('FC Polderstad');
    expect(cleanTeamName('\n  Haven\tUnited\n')).toBe('Haven United');
  });

  it('parses signed integers and falls back to 0', () => {
    expect(safeInt('+25')).toBe(25);
    expect(safeInt(' -3 ')).toBe(-3);
    expect(safeInt('12 pts')).toBe(12);
    expect(safeInt('abc')).toBe(0);
    expect(safeInt('')).toBe(0);
    expect(safeInt('5-')).toBe(0);
  });

  it('splits combined cells and pads missing parts', () => {
    expect(splitInts('9 | 1 | 0', '|', 3)).toEqual([9, 1, 0]);
    expect(splitInts('30 - 5', '-', 2)).toEqual([30, 5]);
    expect(splitInts('7', '/', 3)).toEqual([7, 0, 0]);
  });
});

describe('normalizeStandings', () => {
  it('sorts by position', () => {
    const result = normalizeStandings([row(2, 'B'), row(1, 'A'), row(3, 'C')]);
    expect(result.map((r) => r.team)).toEqual(['A', 'B', 'C']);
    expect(result.map((r) => r.position)).toEqual([1, 2, 3]);
  });

  it('renumbers shared and skipped positions', () => {
    const result = normalizeStandings([row(1, 'A'), row(3, 'B'), row(3, 'C'), row(7, 'D')]);
    expect(result.map((r) => r.team)).toEqual(['A', 'B', 'C', 'D']);
    expect(result.map((r) => r.position)).toEqual([1, 2, 3, 4]);
  });

  it('does not mutate its input', () => {
    const input = [row(2, 'B'), row(1, 'A')];
    normalizeStandings(input);
    expect(input.map((r) => r.team)).toEqual(['B', 'A']);
  });
});

describe('EredivisieScraper', () => {
  const scraper = new EredivisieScraper();

  it('parses the full standings table', () => {
    const rows = scraper.parse(loadFixture('eredivisie.html'));

    expect(rows.length).toBe(18);
    expect(rows[0]).toEqual({
      position: 1,
      team: 'FC Polderstad',
      played: 10,
      won: 9,
      drawn: 0,
      lost: 1,
      points: 27,
      goalsFor: 30,
      goalsAgainst: 5,
      goalDifference: 25,
    });
    expect(rows[17].team).toBe('Eemland FC');
    expect(rows[17].position).toBe(18);
  });

  it('cleans decorated team names', () => {
    const rows = scraper.parse(loadFixture('eredivisie.html'));
    expect(rows[2].team).toBe('Vv Molenbeek');
  });

  it('reads negative goal differences', () => {
    const rows = scraper.parse(loadFixture('eredivisie.html'));
    expect(rows[13]).toMatchObject({ team: 'VV Kwelder', goalDifference: -1, goalsFor: 17, goalsAgainst: 18 });
  });

  it('returns strictly increasing positions starting at 1', () => {
    const rows = scraper.parse(loadFixture('eredivisie.html'));
    rows.forEach((r, i) => expect(r.position).toBe(i + 1));
  });

  it('accepts a partial table with enough teams', () => {
    const html = buildTable(Array.from({ length: 12 }, (_, i) => eredivisieRow(String(i + 1), `Team ${i + 1}`)));
    const rows = scraper.parse(html);
    expect(rows.length).toBe(12);
    expect(rows[11].team).toBe('Team 12');
  });

  it('sorts rows listed out of order', () => {
    const rows = Array.from({ length: 10 }, (_, i) => eredivisieRow(String(10 - i), `Team ${10 - i}`));
    const result = scraper.parse(buildTable(rows));
    expect(result[0].team).toBe('Team 1');
    expect(result[9].team).toBe('Team 10');
  });

  it('uses the row order when the position cell is not a number', () => {
    const rows = Array.from({ length: 10 }, (_, i) => eredivisieRow(i === 4 ? '-' : String(i + 1), `Team ${i + 1}`));
    const result = scraper.parse(buildTable(rows));
    expect(result[4]).toMatchObject({ position: 5, team: 'Team 5' });
  });

  it('skips rows without a usable team name or with too few cells', () => {
    const rows = Array.from({ length: 12 }, (_, i) => eredivisieRow(String(i + 1), `Team ${i + 1}`));
    rows[3] = eredivisieRow('4', ' * ');
    rows[5] = ['6', 'Short row'];
    const result = scraper.parse(buildTable(rows));
    expect(result.length).toBe(10);
    expect(result.map((r) => r.team)).not.toContain('Short row');
    expect(result[3]).toMatchObject({ position: 4, team: 'Team 5' });
  });

  it('throws ParseError when fewer than 10 teams are found', () => {
    const html = buildTable(Array.from({ length: 9 }, (_, i) => eredivisieRow(String(i + 1), `Team ${i + 1}`)));
    expect(() => scraper.parse(html)).toThrow(ParseError);
    expect(() => scraper.parse(html)).toThrow('Only found 9 Eredivisie teams, expected 18');
  });

  it('ignores header rows made of th cells inside the body', () => {
    const header = '<tr><th>#</th><th>Club</th><th>G</th><th>W|V|G</th><th>Doelsaldo</th><th>+/-</th><th>P</th></tr>';
    const html = buildTable(Array.from({ length: 18 }, (_, i) => eredivisieRow(String(i + 1), `Team ${i + 1}`)))
      .replace('<tbody>', `<tbody>${header}`);

    const rows = scraper.parse(html);

    expect(rows.length).toBe(18);
    expect(rows[0].team).toBe('Team 1');
    expect(rows[17].team).toBe('Team 18');
  });

  it('throws ParseError when the page has no table', () => {
    expect(() => scraper.parse('<html><body><p>Onderhoud</p></body></html>')).toThrow(ParseError);
  });
});

describe('KkdScraper', () => {
  const scraper = new KkdScraper();

  it('parses the full standings table', () => {
    const rows = scraper.parse(loadFixture('kkd.html'));

    expect(rows.length).toBe(20);
    expect(rows[0]).toEqual({
      position: 1,
      team: 'Almere Vooruit',
      played: 12,
      won: 10,
      drawn: 0,
      lost: 2,
      points: 30,
      goalsFor: 28,
      goalsAgainst: 6,
      goalDifference: 22,
    });
  });

  it('falls back to the logo alt text for the team name', () => {
    const rows = scraper.parse(loadFixture('kkd.html'));
    expect(rows[4]).toMatchObject({ position: 5, team: 'FC Dordwaal' });
  });

  it('falls back to the name cell text when there is no link or alt text', () => {
    const rows = scraper.parse(loadFixture('kkd.html'));
    expect(rows[5]).toMatchObject({ position: 6, team: 'TOP Oss-Zuid' });
  });

  it('keeps negative points and logs them', () => {
    const rows = scraper.parse(loadFixture('kkd.html'));
    expect(rows[19]).toMatchObject({
      position: 20,
      team: 'Vitesse Rijnoever',
      points: -6,
      won: 1,
      drawn: 1,
      lost: 10,
      goalDifference: -16,
    });
    expect(console.log).toHaveBeenCalledWith('[scraper] Vitesse Rijnoever has -6 points');
  });

  it('uses the row order when the position is out of range', () => {
    const rows = Array.from({ length: 10 }, (_, i) => [
      '',
      i === 2 ? '99' : String(i + 1),
      '<img src="/logo.png" alt="Club ' + (i + 1) + '">',
      'Club ' + (i + 1),
      '8',
      '4/2/2',
      '14',
      '12/9',
      '3',
    ]);
    const result = scraper.parse(buildTable(rows, 'table table-medium'));
    expect(result[2]).toMatchObject({ position: 3, team: 'Club 3', won: 4, drawn: 2, lost: 2 });
  });

  it('defaults missing goal columns to 0', () => {
    const rows = Array.from({ length: 10 }, (_, i) => ['', String(i + 1), '', `Club ${i + 1}`, '8', '4/2/2', '14']);
    const result = scraper.parse(buildTable(rows, 'table'));
    expect(result[0]).toMatchObject({ team: 'Club 1', goalsFor: 0, goalsAgainst: 0, goalDifference: 0 });
  });
});

describe('fetchHtml', () => {
  it('returns the page body and sends a browser user agent', async () => {
    const fetchMock = vi.fn(async () => new Response('<html></html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const html = await fetchHtml('https://example.test/stand', { userAgent: 'test-agent' });

    expect(html).toBe('<html></html>');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.test/stand',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' }),
      })
    );
  });

  it('throws UpstreamError with the status on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));

    const error = await fetchHtml('https://example.test/stand').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: 500, message: 'HTTP 500: https://example.test/stand' });
  });

  it('wraps network failures in UpstreamError', async () => {
    const cause = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(cause)));

    const error = await fetchHtml('https://example.test/stand').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: null, cause });
  });

  it('aborts a request that outlives the timeout', async () => {
    const fetchMock = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );
    vi.stubGlobal('fetch', fetchMock);

    const error = await fetchHtml('https://example.test/stand', { timeoutMs: 20 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ status: null, message: 'Request failed: https://example.test/stand' });
  });
});

describe('StandingsScraper.scrape', () => {
  it('fetches the league page and returns a table', async () => {
    const fetchMock = vi.fn(async () => new Response(loadFixture('eredivisie.html'), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const table = await createScrapers({ timeoutMs: 5000 }).eredivisie.scrape();

    expect(fetchMock).toHaveBeenCalledWith('https://eredivisie.nl/competitie/stand/', expect.anything());
    expect(table.league).toBe('eredivisie');
    expect(table.rows.length).toBe(18);
    expect(Number.isNaN(Date.parse(table.scrapedAt))).toBe(false);
  });

  it('propagates fetch failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404 })));

    await expect(createScrapers().kkd.scrape()).rejects.toBeInstanceOf(UpstreamError);
  });
});
