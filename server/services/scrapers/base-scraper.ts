import pLimit from 'p-limit';
import type { ScrapeRunMetadata, ScrapeRunStatus } from '@shared/schema';
import type { JurisdictionConfig } from '../../config';
import { JurisdictionConfigError } from '../../errors';
import type { IStorage } from '../../storage';
import { Logger } from '../logger';
import { DEFAULT_NAME_SELECTOR, DEFAULT_RESULT_BLOCK_SELECTORS, ExtractionPipeline } from './extraction';
import { RecordNormalizer } from './normalizer';
import { DEFAULT_NEXT_LINK_PATTERN, PaginationTraversal } from './pagination';
import type { DelayRange } from './rate-limiter';
import type { RequestClient } from './request-client';
import { RunContext } from './run-context';
import type { PageRequest, SearchContext } from './types';

/**
 * Everything one scraper instance reads at run time: endpoints, seeds,
 * delays, selectors and the page bound, with unset values already filled in
 */
export interface MergedScraperConfig {
  code: string;
  name: string;

  // URLs
  baseUrl: string;
  sourceUrl?: string;
  searchUrl: string;

  // Bar numbers are fixed-length digit runs
  barNumberLength: number;

  seeds: {
    cities: string[];
    letters: string;
  };
  knownCities: string[];

  // Timing
  delays: {
    politeness: DelayRange;
    betweenPages: DelayRange;
  };

  // Selectors
  selectors: {
    resultBlocks: string[];
    name: string;
    nextLinkText: RegExp;
  };

  maxPages: number;
}

export const ENGINE_DEFAULTS = {
  delays: {
    politeness: { minMs: 1000, maxMs: 2000 },
    betweenPages: { minMs: 2000, maxMs: 3000 },
  },
  maxPages: 200,
} as const;

/**
 * Merge engine defaults with a jurisdiction's configuration. The seed cities
 * double as the known-city list unless one is given.
 */
export function mergeConfigs(
  code: string,
  config: JurisdictionConfig,
  defaultMaxPages: number = ENGINE_DEFAULTS.maxPages
): MergedScraperConfig {
  return {
    code,
    name: config.name,
    baseUrl: config.baseUrl,
    sourceUrl: config.sourceUrl,
    searchUrl: config.searchUrl,
    barNumberLength: config.barNumberLength,
    seeds: {
      cities: [...config.seeds.cities],
      letters: config.seeds.letters.toUpperCase(),
    },
    knownCities: [...(config.knownCities ?? config.seeds.cities)],
    delays: {
      politeness: config.delays?.politeness ?? { ...ENGINE_DEFAULTS.delays.politeness },
      betweenPages: config.delays?.betweenPages ?? { ...ENGINE_DEFAULTS.delays.betweenPages },
    },
    selectors: {
      resultBlocks: config.selectors?.resultBlocks ?? [...DEFAULT_RESULT_BLOCK_SELECTORS],
      name: config.selectors?.name ?? DEFAULT_NAME_SELECTOR,
      nextLinkText: config.selectors?.nextLinkText
        ? new RegExp(config.selectors.nextLinkText, 'i')
        : DEFAULT_NEXT_LINK_PATTERN,
    },
    maxPages: config.maxPages ?? defaultMaxPages,
  };
}

export interface ScraperDeps {
  storage: IStorage;
  client: RequestClient;
  concurrency?: number;
  maxPages?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface ScrapeRunSummary {
  runId: string;
  jurisdiction: string;
  status: ScrapeRunStatus;
  notes: string | null;
  found: number;
  added: number;
  updated: number;
  errors: number;
  metadata: ScrapeRunMetadata;
}

/**
 * Abstract base class for all jurisdiction scrapers.
 * Enumerates search contexts, runs a pagination traversal per context across
 * a bounded worker pool and keeps the scrape run record current.
 */
export abstract class BaseScraper {
  /** Logger component name, e.g. "texas-bar" */
  abstract readonly id: string;

  readonly config: MergedScraperConfig;
  readonly contexts: readonly SearchContext[];
  protected deps: ScraperDeps;
  private client: RequestClient;
  private pipeline: ExtractionPipeline;
  private normalizer: RecordNormalizer;

  constructor(code: string, jurisdiction: JurisdictionConfig, deps: ScraperDeps) {
    this.config = mergeConfigs(code, jurisdiction, deps.maxPages);
    this.deps = deps;
    this.contexts = this.buildSearchContexts();

    this.client = deps.client.withPoliteness(this.config.delays.politeness);
    this.pipeline = new ExtractionPipeline({
      resultBlockSelectors: this.config.selectors.resultBlocks,
      nameSelector: this.config.selectors.name,
      barNumberLength: this.config.barNumberLength,
      knownCities: this.config.knownCities,
    });
    this.normalizer = new RecordNormalizer(this.config.knownCities);
  }

  /**
   * The search submission for one context, i.e. the first page of results
   */
  protected abstract buildSearchRequest(context: SearchContext): PageRequest;

  protected contextLabel(dimension: SearchContext['dimension'], value: string): string {
    return dimension === 'city' ? `City: ${value}` : `Letter: ${value}`;
  }

  /**
   * Cities first, then every configured letter
   */
  private buildSearchContexts(): SearchContext[] {
    const { code, seeds } = this.config;
    const contexts: SearchContext[] = [];

    for (const city of seeds.cities) {
      contexts.push({ jurisdiction: code, dimension: 'city', value: city, label: this.contextLabel('city', city) });
    }
    for (const letter of seeds.letters) {
      contexts.push({ jurisdiction: code, dimension: 'letter', value: letter, label: this.contextLabel('letter', letter) });
    }

    if (contexts.length === 0) {
      throw new JurisdictionConfigError(`Jurisdiction ${code} has no search seeds configured`);
    }
    return contexts;
  }

  /**
   * Main entry point
   */
  async run(options: RunOptions = {}): Promise<ScrapeRunSummary> {
    const { storage } = this.deps;
    const concurrency = Math.max(1, this.deps.concurrency ?? 1);

    const runId = await storage.createScrapeRun(this.config.code);
    const run = new RunContext(this.config.code, runId, options.signal);

    await Logger.info(
      `Starting ${this.config.name} scrape: ${this.contexts.length} search contexts, concurrency ${concurrency}`,
      this.id,
      { runId }
    );

    let status: ScrapeRunStatus = 'completed';
    let notes: string | null = null;

    try {
      const limit = pLimit(concurrency);
      await Promise.all(this.contexts.map(context => limit(() => this.runContext(context, run))));

      if (run.cancelled) {
        status = 'failed';
        notes = 'Cancelled';
      }
    } catch (error) {
      status = 'failed';
      notes = error instanceof Error ? error.message : String(error);
      await Logger.error(`${this.config.name} scrape failed: ${notes}`, this.id, { runId });
    }

    const counters = run.snapshot();
    await storage.updateScrapeRun(runId, { ...counters, status, notes, completedAt: new Date() });

    const summary: ScrapeRunSummary = {
      runId,
      jurisdiction: this.config.code,
      status,
      notes,
      found: counters.attorneysFound,
      added: counters.attorneysAdded,
      updated: counters.attorneysUpdated,
      errors: counters.errors,
      metadata: counters.metadata,
    };

    const message = `${this.config.name} scrape ${notes === 'Cancelled' ? 'cancelled' : status}: ` +
      `${summary.found} found, ${summary.added} added, ${summary.updated} updated, ${summary.errors} errors`;
    if (status === 'completed') {
      await Logger.success(message, this.id, { runId });
    } else {
      await Logger.warning(message, this.id, { runId });
    }

    return summary;
  }

  private async runContext(context: SearchContext, run: RunContext): Promise<void> {
    if (run.cancelled) {
      run.finishContext('cancelled');
      return;
    }

    run.startContext();
    await Logger.info(`Searching ${context.label}...`, this.id);

    try {
      const traversal = new PaginationTraversal(context, this.buildSearchRequest(context), {
        client: this.client,
        pipeline: this.pipeline,
        normalizer: this.normalizer,
        storage: this.deps.storage,
        run,
        maxPages: this.config.maxPages,
        betweenPages: this.config.delays.betweenPages,
        nextLinkPattern: this.config.selectors.nextLinkText,
        sleep: this.deps.sleep,
        random: this.deps.random,
      });

      const result = await traversal.run();
      run.finishContext(result.state);
      await Logger.info(`${context.label}: ${result.state} after ${result.pages} pages, ${result.records} records`, this.id);
    } catch (error) {
      // One context failing never stops its siblings
      run.recordError();
      run.finishContext('failed');
      await Logger.error(`Error searching ${context.label}: ${error}`, this.id);
    }

    try {
      await this.deps.storage.updateScrapeRun(run.runId, run.snapshot());
    } catch (error) {
      await Logger.error(`Could not update run ${run.runId} after ${context.label}: ${error}`, this.id);
    }
  }
}
