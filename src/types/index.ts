/**
 * Core types for the standings service
 * Focus: one row per team, one table per league
 */

// ============================================
// Leagues
// ============================================

export type LeagueId = 'eredivisie' | 'kkd';

export interface LeagueDefinition {
  id: LeagueId;
  /** Display name used in logs and error messages */
  name: string;
  /** Public standings page */
  url: string;
  /** Number of teams in the competition; also the default response limit */
  expectedTeams: number;
  /** Fewer parsed rows than this means the page layout was not recognized */
  minTeams: number;
}

// ============================================
// Standings
// ============================================

export interface StandingRow {
  /** 1-based, strictly increasing within a table */
  position: number;
  team: string;
  played: number;
  won: number;
  drawn: number;
  lost: number;
  /** Can be negative after a points deduction */
  points: number;
  goalsFor: number;
  goalsAgainst: number;
  goalDifference: number;
}

export interface StandingsTable {
  league: LeagueId;
  rows: StandingRow[];
  /** ISO-8601 timestamp of the scrape */
  scrapedAt: string;
}
