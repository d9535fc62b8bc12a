/**
 * Keuken Kampioen Divisie scraper
 * https://keukenkampioendivisie.nl/klassement
 *
 * Columns: (marker) | position | logo | team | played | W/G/V | points | DV/DT | DS
 * The full team name sits in a cell that is only visible on large screens;
 * the logo's alt text and the short name cell are fallbacks.
 */

import {
  StandingsScraper,
  MIN_CELLS,
  cleanTeamName,
  hasClasses,
  safeInt,
  splitInts,
  type FetchOptions,
  type HtmlRow,
} from './base-scraper.js';
import { LEAGUES } from './leagues.js';
import type { StandingRow } from '../types/index.js';

const TEAM_NAME_CLASSES = ['font-bold', 'hidden', 'lg:table-cell'];

export class KkdScraper extends StandingsScraper {
  protected readonly selectors = [
    'table.table-medium tbody tr',
    'table.table tbody tr',
    '.standings-table tbody tr',
    'table tbody tr',
    '.table tbody tr',
  ];

  constructor(fetchOptions: Partial<FetchOptions> = {}) {
    super(LEAGUES.kkd, fetchOptions);
  }

  private extractTeamName(row: HtmlRow): string | null {
    const nameCell = row.cells.find((cell) => hasClasses(cell, TEAM_NAME_CLASSES));
    if (nameCell?.linkText) {
      const name = cleanTeamName(nameCell.linkText);
      if (name) return name;
    }

    const logoAlt = row.cells[2].imageAlt;
    if (logoAlt) {
      const name = cleanTeamName(logoAlt);
      if (name) return name;
    }

    if (row.cells.length > 3) {
      const name = cleanTeamName(row.cells[3].text);
      if (name) return name;
    }

    return null;
  }

  protected parseRow(row: HtmlRow, index: number): StandingRow | null {
    const cells = row.cells.map((cell) => cell.text);
    if (cells.length < MIN_CELLS) return null;

    let position = safeInt(cells[1].trim());
    if (position <= 0 || position > this.league.expectedTeams) {
      position = index + 1;
    }

    const team = this.extractTeamName(row);
    if (!team || team.length < 2) {
      console.warn(`[scraper] Could not extract team name from KKD row ${index + 1}`);
      return null;
    }

    const [won, drawn, lost] = splitInts(cells[5].trim(), '/', 3);
    const [goalsFor, goalsAgainst] = splitInts(cells.length > 7 ? cells[7].trim() : '0/0', '/', 2);
    const points = safeInt(cells[6]);

    if (points < 0) {
      console.log(`[scraper] ${team} has ${points} points`);
    }

    return {
      position,
      team,
      played: safeInt(cells[4]),
      won,
      drawn,
      lost,
      points,
      goalsFor,
      goalsAgainst,
      goalDifference: cells.length > 8 ? safeInt(cells[8]) : 0,
    };
  }
}
