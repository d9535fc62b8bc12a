/**
 * Express REST API Server
 * Health check plus one API-key protected standings route per league
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import type { StandingsSource } from '../scraper/base-scraper.js';
import { StandingsError, describeError } from '../errors.js';
import type { LeagueDefinition, LeagueId, StandingsTable } from '../types/index.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Empty string disables authentication */
  apiKey: string;
  /** Global cap on returned rows */
  maxTeams: number | null;
  version: string;
  /** Reported in the health payload */
  trmnlConfigured: boolean;
}

interface StandingsRoute {
  path: string;
  league: LeagueId;
}

const STANDINGS_ROUTES: StandingsRoute[] = [
  { path: '/standings', league: 'eredivisie' },
  { path: '/kkd-standings', league: 'kkd' },
];

export const SERVICE_NAME = 'Eredivisie & KKD Standings Service';

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private sources: Map<LeagueId, StandingsSource> = new Map();

  constructor(config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 8000,
      host: '0.0.0.0',
      corsOrigins: ['*'],
      apiKey: '',
      maxTeams: null,
      version: '0.0.0',
      trmnlConfigured: false,
      ...config,
    };

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  private getQueryAsString(query: unknown): string | undefined {
    if (Array.isArray(query)) {
      return query.length > 0 ? String(query[0]) : undefined;
    }
    return typeof query === 'string' ? query : undefined;
  }

  /**
   * undefined when absent, null when present but not a positive integer
   */
  private parseTop(query: unknown): number | null | undefined {
    const raw = this.getQueryAsString(query);
    if (raw === undefined) return undefined;
    if (!/^\d+$/.test(raw.trim())) return null;
    const top = parseInt(raw.trim(), 10);
    return top > 0 ? top : null;
  }

  private limitFor(league: LeagueDefinition, top: number | undefined): number {
    return Math.min(top ?? Infinity, this.config.maxTeams ?? Infinity, league.expectedTeams);
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    const origins = this.config.corsOrigins;
    this.app.use(cors({
      origin: origins.includes('*') ? '*' : origins,
      exposedHeaders: ['X-Scraped-At'],
    }));
  }

  private requireApiKey(req: Request, res: Response, next: NextFunction): void {
    if (!this.config.apiKey) {
      next();
      return;
    }

    const provided = this.getQueryAsString(req.query.api_key) || req.get('x-api-key');
    if (!provided) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }
    if (provided !== this.config.apiKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }
    next();
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check, never authenticated
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({
        service: SERVICE_NAME,
        status: 'running',
        version: this.config.version,
        authRequired: this.config.apiKey.length > 0,
        leagues: STANDINGS_ROUTES.map((route) => ({
          id: route.league,
          route: route.path,
          available: this.sources.has(route.league),
        })),
        integrations: { trmnlOauth: this.config.trmnlConfigured },
        timestamp: Date.now(),
      });
    });

    for (const route of STANDINGS_ROUTES) {
      this.app.get(
        route.path,
        (req: Request, res: Response, next: NextFunction) => this.requireApiKey(req, res, next),
        (req: Request, res: Response, next: NextFunction) => {
          this.sendStandings(route.league, req, res).catch(next);
        }
      );
    }

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Error handler
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      console.error('[api] Unhandled error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private async sendStandings(league: LeagueId, req: Request, res: Response): Promise<void> {
    const source = this.sources.get(league);
    if (!source) {
      res.status(503).json({ error: 'Standings source not initialized' });
      return;
    }

    const top = this.parseTop(req.query.top);
    if (top === null) {
      res.status(400).json({ error: 'Query parameter "top" must be a positive integer' });
      return;
    }

    let table: StandingsTable;
    try {
      table = await source.scrape();
    } catch (error) {
      if (!(error instanceof StandingsError)) throw error;
      console.error(`[api] ${source.league.name} scrape failed: ${describeError(error)}`);
      res.status(503).json({ error: `${source.league.name} standings data not available` });
      return;
    }

    res.setHeader('X-Scraped-At', table.scrapedAt);
    res.json(table.rows.slice(0, this.limitFor(source.league, top)));
  }

  // ----------------------------------------
  // Integration
  // ----------------------------------------

  setSources(sources: StandingsSource[]): void {
    this.sources.clear();
    for (const source of sources) {
      this.sources.set(source.league.id, source);
    }
  }

  getApp(): Express {
    return this.app;
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`[api] Server running at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Bound port once listening (resolves port 0), configured port otherwise
   */
  getPort(): number {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
