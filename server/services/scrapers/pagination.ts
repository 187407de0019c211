import type { CheerioAPI } from 'cheerio';
import type { IStorage } from '../../storage';
import { Logger } from '../logger';
import type { ExtractionPipeline } from './extraction';
import type { RecordNormalizer } from './normalizer';
import { randomDelay, sleep as defaultSleep, type DelayRange } from './rate-limiter';
import type { FetchFailure, PageContent, RequestClient } from './request-client';
import type { RunContext } from './run-context';
import type { PageRequest, SearchContext } from './types';

export const DEFAULT_NEXT_LINK_PATTERN = /\bnext\b|»/i;

export type TraversalState = 'fetching' | 'parsing' | 'following' | 'done' | 'failed' | 'cancelled';
export type TerminalState = Extract<TraversalState, 'done' | 'failed' | 'cancelled'>;

export interface TraversalResult {
  state: TerminalState;
  pages: number;
  records: number;
  failure?: FetchFailure;
}

export interface TraversalDeps {
  client: RequestClient;
  pipeline: ExtractionPipeline;
  normalizer: RecordNormalizer;
  storage: Pick<IStorage, 'upsertAttorney' | 'attachPracticeAreas'>;
  run: RunContext;
  maxPages: number;
  betweenPages: DelayRange;
  nextLinkPattern?: RegExp;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Absolute locator of the first "next"-like link with a usable href, resolved
 * against the page it was found on. Fragments are dropped.
 */
export function findNextLocator(
  $: CheerioAPI,
  currentUrl: string,
  pattern: RegExp = DEFAULT_NEXT_LINK_PATTERN
): string | null {
  for (const anchor of $('a[href]').toArray()) {
    if (!pattern.test($(anchor).text())) continue;

    const href = (anchor.attribs.href ?? '').trim();
    if (!href || href.startsWith('#') || /^javascript:/i.test(href)) continue;

    try {
      const url = new URL(href, currentUrl);
      url.hash = '';
      return url.toString();
    } catch {
      continue;
    }
  }
  return null;
}

export function locatorOf(request: PageRequest): string {
  if (request.method === 'POST' || !request.params) return request.url;
  try {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  } catch {
    return request.url;
  }
}

/**
 * Walks one search context's result pages: fetch, parse and persist, then
 * follow the next link until none is left, it was already visited or the
 * page bound is reached.
 */
export class PaginationTraversal {
  private state: TraversalState = 'fetching';
  private visited = new Set<string>();
  private request: PageRequest;
  private page: PageContent | null = null;
  private document: CheerioAPI | null = null;
  private pages = 0;
  private records = 0;
  private failure: FetchFailure | undefined;

  constructor(
    private context: SearchContext,
    initialRequest: PageRequest,
    private deps: TraversalDeps
  ) {
    this.request = initialRequest;
    this.visited.add(locatorOf(initialRequest));
  }

  get currentState(): TraversalState {
    return this.state;
  }

  async run(): Promise<TraversalResult> {
    for (;;) {
      switch (this.state) {
        case 'fetching':
          await this.fetchPage();
          break;
        case 'parsing':
          await this.parsePage();
          break;
        case 'following':
          await this.followNext();
          break;
        case 'done':
        case 'failed':
        case 'cancelled':
          return { state: this.state, pages: this.pages, records: this.records, failure: this.failure };
      }
    }
  }

  private async fetchPage(): Promise<void> {
    if (this.deps.run.cancelled) {
      this.state = 'cancelled';
      return;
    }

    const outcome = await this.deps.client.fetch(this.request);
    if (!outcome.ok) {
      this.deps.run.recordError();
      this.failure = outcome.failure;
      this.state = 'failed';
      await Logger.error(
        `${this.context.label}: giving up after ${outcome.failure.attempts} attempts on page ${this.pages + 1}`,
        'pagination',
        { jurisdiction: this.context.jurisdiction, url: outcome.failure.url, reason: outcome.failure.reason }
      );
      return;
    }

    this.pages++;
    this.deps.run.recordPage();
    this.page = outcome.page;
    this.visited.add(outcome.page.url);
    this.state = 'parsing';
  }

  private async parsePage(): Promise<void> {
    const page = this.page;
    if (!page) {
      this.state = 'failed';
      return;
    }

    const { pipeline, normalizer, storage, run } = this.deps;
    this.document = pipeline.load(page.body);
    const extraction = pipeline.extract(this.document);

    for (const message of extraction.errors) {
      await Logger.warning(`${this.context.label}: extraction strategy skipped (${message})`, 'pagination');
    }

    for (const candidate of extraction.candidates) {
      const record = normalizer.normalize(candidate, this.context.jurisdiction);
      if (!record) continue;

      try {
        const result = await storage.upsertAttorney(record);
        run.recordUpsert(result.outcome);
        this.records++;

        if (record.practiceAreas.length > 0) {
          await storage.attachPracticeAreas(result.id, record.practiceAreas);
        }
      } catch (error) {
        run.recordError();
        await Logger.error(`${this.context.label}: failed to store ${record.fullName}: ${error}`, 'pagination');
      }
    }

    await Logger.info(
      `${this.context.label}: page ${this.pages} yielded ${extraction.candidates.length} candidates` +
        (extraction.strategy ? ` via ${extraction.strategy}` : ''),
      'pagination'
    );

    this.state = 'following';
  }

  private async followNext(): Promise<void> {
    const page = this.page;
    const document = this.document;
    this.page = null;
    this.document = null;

    if (!page || !document) {
      this.state = 'done';
      return;
    }

    const next = findNextLocator(document, page.url, this.deps.nextLinkPattern);
    if (!next) {
      this.state = 'done';
      return;
    }

    if (this.visited.has(next)) {
      await Logger.info(`${this.context.label}: next link ${next} already visited, stopping`, 'pagination');
      this.state = 'done';
      return;
    }

    if (this.pages >= this.deps.maxPages) {
      await Logger.warning(`${this.context.label}: reached the ${this.deps.maxPages} page limit`, 'pagination');
      this.state = 'done';
      return;
    }

    this.visited.add(next);
    this.request = { url: next, method: 'GET' };

    const wait = randomDelay(this.deps.betweenPages, this.deps.random);
    if (wait > 0) {
      await (this.deps.sleep ?? defaultSleep)(wait);
    }
    this.state = 'fetching';
  }
}
