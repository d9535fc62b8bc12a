#!/usr/bin/env node
/**
 * Standings Service - Main Entry Point
 * Provides CLI for starting the API server or scraping a league once
 */

import { readFileSync } from 'fs';
import { loadConfig, isTrmnlConfigured, type ServiceConfig } from './config/index.js';
import { createScrapers, isLeagueId, listLeagues } from './scraper/index.js';
import { ApiServer, SERVICE_NAME } from './server/index.js';
import type { LeagueId, StandingRow } from './types/index.js';

// ============================================
// CLI Arguments
// ============================================

interface CliArgs {
  command: 'serve' | 'scrape' | 'help';
  league: LeagueId;
  port: number | null;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = {
    command: 'serve',
    league: 'eredivisie',
    port: null,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === 'serve' || arg === 'scrape' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      const port = parseInt(args[++i]);
      result.port = Number.isNaN(port) ? null : port;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else if (isLeagueId(arg)) {
      result.league = arg;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
${SERVICE_NAME}

Usage: standings-service [command] [options] [league]

Commands:
  serve     Start the API server (default)
  scrape    Scrape one league and print the table
  help      Show this help message

Leagues:
${listLeagues().map((league) => `  ${league.id.padEnd(10)}${league.name}`).join('\n')}

Options:
  -p, --port <port>   Server port (default: PORT or 8000)
  -h, --help          Show help

Environment:
  API_KEY             Key required on standings routes (unset: no auth)
  HOST, PORT          Listen address
  CORS_ORIGINS        Comma-separated allowed origins (default: *)
  MAX_TEAMS           Cap on returned rows
  FETCH_TIMEOUT_MS    Upstream request timeout (default: 30000)
`);
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function formatRow(row: StandingRow): string {
  return [
    String(row.position).padStart(2),
    row.team.padEnd(28),
    String(row.played).padStart(3),
    `${row.won}/${row.drawn}/${row.lost}`.padStart(9),
    `${row.goalsFor}-${row.goalsAgainst}`.padStart(7),
    String(row.goalDifference).padStart(4),
    String(row.points).padStart(4),
  ].join(' ');
}

// ============================================
// Commands
// ============================================

async function runScrape(config: Readonly<ServiceConfig>, league: LeagueId): Promise<void> {
  const scraper = createScrapers({ timeoutMs: config.fetchTimeoutMs })[league];
  console.log(`Scraping ${scraper.league.name} from ${scraper.league.url}...`);

  const startTime = Date.now();
  const table = await scraper.scrape();
  const duration = Date.now() - startTime;

  console.log(`\n${table.rows.map(formatRow).join('\n')}\n`);
  console.log(`${table.rows.length} teams in ${duration}ms (scraped at ${table.scrapedAt})`);
}

async function runServe(config: Readonly<ServiceConfig>): Promise<void> {
  console.log(`Starting ${SERVICE_NAME}...`);

  if (!config.apiKey) {
    console.warn('API_KEY environment variable not set. API will be accessible without authentication.');
  }

  const scrapers = createScrapers({ timeoutMs: config.fetchTimeoutMs });
  const server = new ApiServer({
    port: config.port,
    host: config.host,
    corsOrigins: config.corsOrigins,
    apiKey: config.apiKey,
    maxTeams: config.maxTeams,
    version: readVersion(),
    trmnlConfigured: isTrmnlConfigured(config),
  });
  server.setSources(Object.values(scrapers));

  const shutdown = (signal: string): void => {
    console.log(`Received ${signal}, shutting down...`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.start();
  console.log(`
Endpoints:
  GET /                 - Health check
  GET /standings        - Eredivisie standings (?top=N)
  GET /kkd-standings    - Keuken Kampioen Divisie standings (?top=N)

Press Ctrl+C to stop
`);
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.command === 'help') {
    printHelp();
    return;
  }

  const loaded = loadConfig();
  const config = args.port === null ? loaded : Object.freeze({ ...loaded, port: args.port });

  switch (args.command) {
    case 'scrape':
      await runScrape(config, args.league);
      break;

    case 'serve':
      await runServe(config);
      break;
  }
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
