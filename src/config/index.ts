/**
 * Service configuration
 * Read once from the environment and validated with zod
 */

import { z } from 'zod';

// ============================================
// Types
// ============================================

export interface ServiceConfig {
  /** Shared secret for the standings routes; empty disables auth */
  apiKey: string;
  port: number;
  host: string;
  corsOrigins: string[];
  /** Global cap on returned rows, on top of each league's team count */
  maxTeams: number | null;
  fetchTimeoutMs: number;
  trmnl: {
    clientId: string | null;
    clientSecret: string | null;
    redirectUri: string | null;
  };
}

// ============================================
// Schema
// ============================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const envSchema = z.object({
  API_KEY: z.string().default(''),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  CORS_ORIGINS: z.string().default('*'),
  MAX_TEAMS: z.coerce.number().int().positive().optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TRMNL_CLIENT_ID: optionalString,
  TRMNL_CLIENT_SECRET: optionalString,
  TRMNL_REDIRECT_URI: optionalString,
});

function parseOrigins(value: string): string[] {
  return value
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Build the config from an environment map. Empty strings count as unset,
 * which is how docker passes `ENV API_KEY=""`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServiceConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key === 'API_KEY' || (value !== undefined && value !== ''))
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  return Object.freeze({
    apiKey: parsed.API_KEY.trim(),
    port: parsed.PORT,
    host: parsed.HOST,
    corsOrigins: parseOrigins(parsed.CORS_ORIGINS),
    maxTeams: parsed.MAX_TEAMS ?? null,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    trmnl: Object.freeze({
      clientId: parsed.TRMNL_CLIENT_ID,
      clientSecret: parsed.TRMNL_CLIENT_SECRET,
      redirectUri: parsed.TRMNL_REDIRECT_URI,
    }),
  });
}

export function isTrmnlConfigured(config: Readonly<ServiceConfig>): boolean {
  return config.trmnl.clientId !== null && config.trmnl.clientSecret !== null;
}
