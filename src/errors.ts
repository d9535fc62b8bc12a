/**
 * Error types raised while scraping a standings page
 */

export class StandingsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StandingsError';
  }
}

/**
 * The standings page could not be fetched (network failure, timeout, non-2xx)
 */
export class UpstreamError extends StandingsError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, status: number | null, options?: { cause?: unknown }) {
    super(status === null ? `Request failed: ${url}` : `HTTP ${status}: ${url}`, options);
    this.name = 'UpstreamError';
    this.url = url;
    this.status = status;
  }
}

/**
 * The page was fetched but its table did not yield usable rows
 */
export class ParseError extends StandingsError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
