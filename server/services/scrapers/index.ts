/**
 * Jurisdiction Scrapers Module
 *
 * Config-driven extraction engine for state bar member directories.
 *
 * Architecture:
 * - RequestClient: rate-limited GET/POST with retries, shared HostRateLimiter
 * - ExtractionPipeline: ordered strategy cascade over raw HTML
 * - RecordNormalizer: candidate fields to AttorneyRecord
 * - PaginationTraversal: per-search-context state machine with a cycle guard
 * - BaseScraper: seeds, worker pool and run tracking; one subclass per jurisdiction
 * - ScraperFactory: creates the right scraper for a jurisdiction code
 *
 * Usage:
 * ```typescript
 * import { createScraper, RequestClient } from './scrapers';
 *
 * const scraper = await createScraper('TX', { storage, client: new RequestClient() }, loadJurisdictions());
 * const summary = await scraper.run({ signal });
 * ```
 */

// Base scraper and types
export { BaseScraper, mergeConfigs, ENGINE_DEFAULTS } from './base-scraper';
export type { MergedScraperConfig, ScraperDeps, ScrapeRunSummary, RunOptions } from './base-scraper';
export type { SearchContext, PageRequest, CandidateRecord } from './types';

// Engine components
export { RequestClient } from './request-client';
export type { FetchOutcome, FetchFailure } from './request-client';
export { HostRateLimiter } from './rate-limiter';
export { ExtractionPipeline } from './extraction';
export { RecordNormalizer } from './normalizer';
export { PaginationTraversal, findNextLocator } from './pagination';
export { RunContext } from './run-context';

// Jurisdiction scrapers
export { TexasBarScraper } from './texas-bar';

// Factory
export {
  createScraper,
  getAvailableJurisdictions,
  isJurisdictionSupported,
  JURISDICTION_IDS,
  type JurisdictionId
} from './scraper-factory';
