/**
 * Eredivisie scraper
 * https://eredivisie.nl/competitie/stand/
 *
 * Columns: position | team | played | W|L|D | goals F-A | goal diff | points
 */

import {
  StandingsScraper,
  MIN_CELLS,
  cleanTeamName,
  safeInt,
  splitInts,
  type FetchOptions,
  type HtmlRow,
} from './base-scraper.js';
import { LEAGUES } from './leagues.js';
import type { StandingRow } from '../types/index.js';

export class EredivisieScraper extends StandingsScraper {
  protected readonly selectors = [
    'table.standings tbody tr',
    '.standings-table tbody tr',
    'table tbody tr',
    '.table tbody tr',
  ];

  constructor(fetchOptions: Partial<FetchOptions> = {}) {
    super(LEAGUES.eredivisie, fetchOptions);
  }

  protected parseRow(row: HtmlRow, index: number): StandingRow | null {
    const cells = row.cells.map((cell) => cell.text);
    if (cells.length < MIN_CELLS) return null;

    const positionText = cells[0].trim();
    const position = /^\d+$/.test(positionText) ? parseInt(positionText, 10) : index + 1;

    const team = cleanTeamName(cells[1]);
    if (team.length < 2) return null;

    // The results cell lists wins, losses, draws in that order
    const [won, lost, drawn] = splitInts(cells[3], '|', 3);
    const [goalsFor, goalsAgainst] = splitInts(cells[4], '-', 2);

    return {
      position,
      team,
      played: safeInt(cells[2]),
      won,
      drawn,
      lost,
      points: safeInt(cells[6]),
      goalsFor,
      goalsAgainst,
      goalDifference: safeInt(cells[5]),
    };
  }
}
