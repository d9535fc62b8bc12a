/**
 * Base scraper
 * Fetches a standings page and turns its HTML table into StandingRows.
 * League scrapers only describe their selectors and column layout.
 */

import * as cheerio from 'cheerio';
import { ParseError, UpstreamError } from '../errors.js';
import type { LeagueDefinition, StandingRow, StandingsTable } from '../types/index.js';

// ============================================
// Types
// ============================================

export interface FetchOptions {
  /** Abort the request after this many ms */
  timeoutMs: number;
  userAgent: string;
}

/** A table cell reduced to what the league parsers look at */
export interface HtmlCell {
  text: string;
  classes: string[];
  /** `alt` of the first image in the cell */
  imageAlt: string | null;
  /** Text of the first link in the cell */
  linkText: string | null;
}

export interface HtmlRow {
  cells: HtmlCell[];
}

/** Anything the API can ask for a standings table */
export interface StandingsSource {
  readonly league: LeagueDefinition;
  scrape(): Promise<StandingsTable>;
}

export const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  timeoutMs: 30000,
  userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
};

/** Rows with fewer cells cannot hold position, team and the stat columns */
export const MIN_CELLS = 7;

// ============================================
// Fetching
// ============================================

/**
 * GET a page as text. No retries: any failure surfaces as UpstreamError.
 */
export async function fetchHtml(url: string, options: Partial<FetchOptions> = {}): Promise<string> {
  const { timeoutMs, userAgent } = { ...DEFAULT_FETCH_OPTIONS, ...options };
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'nl-NL,nl;q=0.9,en;q=0.8',
      },
      signal: controller.signal,
    });
    if (!res.ok) {
      throw new UpstreamError(url, res.status);
    }
    return await res.text();
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamError(url, null, { cause: err });
  } finally {
    clearTimeout(timeout);
  }
}

// ============================================
// Cell helpers
// ============================================

export function cleanTeamName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').replace(/\*/g, '').trim();
}

/**
 * Keep digits and minus signs; anything that is then not an integer is 0
 */
export function safeInt(value: string): number {
  const clean = value.replace(/[^\d-]/g, '');
  return /^-?\d+$/.test(clean) ? parseInt(clean, 10) : 0;
}

/**
 * Split a combined cell such as "12|3|4" or "30-12" into `count` integers,
 * padding missing parts with 0
 */
export function splitInts(value: string, separator: string, count: number): number[] {
  const parts = value.split(separator);
  return Array.from({ length: count }, (_, i) => (i < parts.length ? safeInt(parts[i]) : 0));
}

export function hasClasses(cell: HtmlCell, classes: string[]): boolean {
  return classes.every((cls) => cell.classes.includes(cls));
}

function readRows($: cheerio.CheerioAPI, selector: string): HtmlRow[] {
  return $(selector)
    .filter((_, tr) => $(tr).find('td').length > 0)
    .map((_, tr) => {
      const cells = $(tr)
        .find('td, th')
        .map((__, td) => {
          const $td = $(td);
          const $link = $td.find('a').first();
          return {
            text: $td.text(),
            classes: ($td.attr('class') ?? '').split(/\s+/).filter((cls) => cls.length > 0),
            imageAlt: $td.find('img').first().attr('alt') ?? null,
            linkText: $link.length > 0 ? $link.text() : null,
          };
        })
        .get();
      return { cells };
    })
    .get();
}

/**
 * Sort by scraped position and renumber 1..n so positions are strictly
 * increasing even when the page repeats or skips one
 */
export function normalizeStandings(rows: StandingRow[]): StandingRow[] {
  return [...rows]
    .sort((a, b) => a.position - b.position)
    .map((row, i) => (row.position === i + 1 ? row : { ...row, position: i + 1 }));
}

// ============================================
// Scraper
// ============================================

export abstract class StandingsScraper implements StandingsSource {
  readonly league: LeagueDefinition;
  protected readonly fetchOptions: Partial<FetchOptions>;

  /** Row selectors, most specific first */
  protected abstract readonly selectors: string[];

  constructor(league: LeagueDefinition, fetchOptions: Partial<FetchOptions> = {}) {
    this.league = league;
    this.fetchOptions = fetchOptions;
  }

  /**
   * Map one table row to a StandingRow, or null to skip it
   */
  protected abstract parseRow(row: HtmlRow, index: number): StandingRow | null;

  async scrape(): Promise<StandingsTable> {
    const html = await fetchHtml(this.league.url, this.fetchOptions);
    const rows = this.parse(html);
    console.log(`[scraper] Scraped ${rows.length} ${this.league.name} teams`);
    return {
      league: this.league.id,
      rows,
      scrapedAt: new Date().toISOString(),
    };
  }

  parse(html: string): StandingRow[] {
    const $ = cheerio.load(html);
    const htmlRows = this.findRows($);

    const parsed: StandingRow[] = [];
    htmlRows.slice(0, this.league.expectedTeams).forEach((row, i) => {
      const standing = this.parseRow(row, i);
      if (standing) parsed.push(standing);
    });

    if (parsed.length < this.league.minTeams) {
      throw new ParseError(
        `Only found ${parsed.length} ${this.league.name} teams, expected ${this.league.expectedTeams}`
      );
    }

    const normalized = normalizeStandings(parsed);
    if (normalized.some((row, i) => row !== parsed[i])) {
      console.warn(`[scraper] ${this.league.name} positions were reordered or renumbered`);
    }
    return normalized;
  }

  /**
   * First selector with a full table wins, otherwise the largest match
   */
  protected findRows($: cheerio.CheerioAPI): HtmlRow[] {
    let best: HtmlRow[] = [];

    for (const selector of this.selectors) {
      const rows = readRows($, selector);
      if (rows.length >= this.league.expectedTeams) {
        console.log(`[scraper] Found ${this.league.name} table using selector: ${selector}`);
        return rows;
      }
      if (rows.length > best.length) best = rows;
    }

    console.log(`[scraper] Found ${best.length} ${this.league.name} table rows`);
    return best;
  }
}
