/**
 * Scraper module exports
 */

import { EredivisieScraper } from './eredivisie.js';
import { KkdScraper } from './kkd.js';
import { LEAGUES } from './leagues.js';
import type { FetchOptions, StandingsScraper } from './base-scraper.js';
import type { LeagueDefinition, LeagueId } from '../types/index.js';

export {
  StandingsScraper,
  fetchHtml,
  normalizeStandings,
  cleanTeamName,
  safeInt,
  splitInts,
  DEFAULT_FETCH_OPTIONS,
  type FetchOptions,
  type HtmlCell,
  type HtmlRow,
  type StandingsSource,
} from './base-scraper.js';
export { EredivisieScraper } from './eredivisie.js';
export { KkdScraper } from './kkd.js';
export { LEAGUES, isLeagueId } from './leagues.js';

export type ScraperRegistry = Record<LeagueId, StandingsScraper>;

/**
 * One scraper per league, sharing the same fetch settings
 */
export function createScrapers(fetchOptions: Partial<FetchOptions> = {}): ScraperRegistry {
  return {
    eredivisie: new EredivisieScraper(fetchOptions),
    kkd: new KkdScraper(fetchOptions),
  };
}

export function listLeagues(): LeagueDefinition[] {
  return Object.values(LEAGUES);
}
