import type { JurisdictionRegistry } from '../../config';
import { JurisdictionConfigError } from '../../errors';
import { Logger } from '../logger';
import type { BaseScraper, ScraperDeps } from './base-scraper';
import { TexasBarScraper } from './texas-bar';

/**
 * Jurisdiction code constants
 */
export const JURISDICTION_IDS = {
  TEXAS: 'TX',
} as const;

export type JurisdictionId = typeof JURISDICTION_IDS[keyof typeof JURISDICTION_IDS];

/**
 * Get all jurisdiction codes with a scraper implementation
 */
export function getAvailableJurisdictions(): string[] {
  return Object.values(JURISDICTION_IDS);
}

/**
 * Check if a jurisdiction is supported
 */
export function isJurisdictionSupported(code: string): code is JurisdictionId {
  return Object.values(JURISDICTION_IDS).some(id => id === code);
}

/**
 * Create the scraper for a jurisdiction code.
 *
 * Unknown codes, codes missing from the jurisdiction file and jurisdictions
 * without seeds all throw JurisdictionConfigError before any request is made.
 */
export async function createScraper(
  code: string,
  deps: ScraperDeps,
  registry: JurisdictionRegistry
): Promise<BaseScraper> {
  const normalized = code.trim().toUpperCase();

  if (!isJurisdictionSupported(normalized)) {
    throw new JurisdictionConfigError(
      `Unknown jurisdiction "${code}". Available: ${getAvailableJurisdictions().join(', ')}`
    );
  }

  const config = registry[normalized];
  if (!config) {
    throw new JurisdictionConfigError(`Jurisdiction ${normalized} is not configured`);
  }

  await Logger.info(`Creating scraper for ${config.name} (${normalized})`, 'scraper-factory');

  switch (normalized) {
    case JURISDICTION_IDS.TEXAS:
      return new TexasBarScraper(normalized, config, deps);

    default:
      throw new JurisdictionConfigError(`No scraper implementation for ${normalized}`);
  }
}
