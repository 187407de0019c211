import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { JurisdictionConfigError } from './errors';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).optional(),
  STORAGE: z.enum(['database', 'memory']).default('database'),
  SCRAPER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  SCRAPER_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  SCRAPER_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  SCRAPER_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCRAPER_MAX_PAGES: z.coerce.number().int().positive().default(200),
  SCRAPE_JURISDICTIONS: z.string().default('TX'),
  SCRAPE_SCHEDULE: z.string().default('0 3 * * 0'), // Sundays 3:00 AM
  SCRAPE_TIMEZONE: z.string().default('America/Chicago'),
  SCHEDULER_ENABLED: booleanString.default('true'),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  databaseUrl?: string;
  storage: 'database' | 'memory';
  scraper: {
    concurrency: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    requestTimeoutMs: number;
    maxPages: number;
  };
  schedule: {
    enabled: boolean;
    cron: string;
    timezone: string;
    jurisdictions: string[];
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    env: vars.NODE_ENV,
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    storage: vars.STORAGE,
    scraper: {
      concurrency: vars.SCRAPER_CONCURRENCY,
      maxRetries: vars.SCRAPER_MAX_RETRIES,
      retryBaseDelayMs: vars.SCRAPER_RETRY_BASE_DELAY_MS,
      requestTimeoutMs: vars.SCRAPER_REQUEST_TIMEOUT_MS,
      maxPages: vars.SCRAPER_MAX_PAGES,
    },
    schedule: {
      enabled: vars.SCHEDULER_ENABLED,
      cron: vars.SCRAPE_SCHEDULE,
      timezone: vars.SCRAPE_TIMEZONE,
      jurisdictions: parseJurisdictionList(vars.SCRAPE_JURISDICTIONS),
    },
  };
}

export function parseJurisdictionList(value: string): string[] {
  return Array.from(new Set(
    value.split(',').map(code => code.trim().toUpperCase()).filter(Boolean)
  ));
}

// Jurisdiction file (config/jurisdictions.json)

const delayRangeSchema = z
  .object({
    minMs: z.number().int().min(0),
    maxMs: z.number().int().min(0),
  })
  .refine(range => range.maxMs >= range.minMs, { message: 'maxMs must be >= minMs' });

export const jurisdictionConfigSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url(),
  sourceUrl: z.string().url().optional(),
  searchUrl: z.string().url(),
  barNumberLength: z.number().int().positive().default(8),
  seeds: z.object({
    cities: z.array(z.string().trim().min(1)).default([]),
    letters: z.string().regex(/^[A-Za-z]*$/).default(''),
  }),
  knownCities: z.array(z.string().trim().min(1)).optional(),
  delays: z
    .object({
      politeness: delayRangeSchema.optional(),
      betweenPages: delayRangeSchema.optional(),
    })
    .optional(),
  selectors: z
    .object({
      resultBlocks: z.array(z.string().min(1)).min(1).optional(),
      name: z.string().min(1).optional(),
      nextLinkText: z.string().min(1).optional(),
    })
    .optional(),
  maxPages: z.number().int().positive().optional(),
});

export type JurisdictionConfig = z.infer<typeof jurisdictionConfigSchema>;

const jurisdictionsFileSchema = z.record(
  z.string().regex(/^[A-Z]{2,3}$/, 'jurisdiction codes are 2-3 upper-case letters'),
  jurisdictionConfigSchema
);

export type JurisdictionRegistry = Record<string, JurisdictionConfig>;

export const DEFAULT_JURISDICTIONS_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../config/jurisdictions.json'
);

export function parseJurisdictions(raw: unknown): JurisdictionRegistry {
  const parsed = jurisdictionsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new JurisdictionConfigError(`Invalid jurisdiction configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadJurisdictions(filePath: string = DEFAULT_JURISDICTIONS_PATH): JurisdictionRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new JurisdictionConfigError(`Could not read jurisdiction file ${filePath}: ${error instanceof Error ? error.message : error}`);
  }
  return parseJurisdictions(raw);
}
