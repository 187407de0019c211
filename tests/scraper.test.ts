import { describe, it, expect } from 'vitest';

import { JurisdictionConfigError } from '../server/errors';
import { MemStorage } from '../server/memory-storage';
import { createScraper, getAvailableJurisdictions, mergeConfigs } from '../server/services/scrapers';
import { SEARCH_URL, fakeFetch, noSleep, page, resultBlock, testClient, testRegistry, type RecordedRequest } from './helpers';

function searchedCity(request: RecordedRequest): string | null {
  return new URLSearchParams(request.body).get('City');
}

describe('createScraper', () => {
  it('rejects unknown jurisdictions before any request or run record', async () => {
    const storage = new MemStorage();
    const { impl, calls } = fakeFetch(() => ({ body: '' }));

    await expect(createScraper('ZZ', { storage, client: testClient(impl) }, testRegistry(['Austin'])))
      .rejects.toThrow(JurisdictionConfigError);

    expect(calls).toHaveLength(0);
    expect(await storage.getRecentScrapeRuns(10)).toEqual([]);
  });

  it('rejects a supported jurisdiction missing from the configuration', async () => {
    const { impl } = fakeFetch(() => ({ body: '' }));

    await expect(createScraper('TX', { storage: new MemStorage(), client: testClient(impl) }, {}))
      .rejects.toThrow('Jurisdiction TX is not configured');
  });

  it('rejects a jurisdiction without search seeds', async () => {
    const storage = new MemStorage();
    const { impl } = fakeFetch(() => ({ body: '' }));

    await expect(createScraper('TX', { storage, client: testClient(impl) }, testRegistry([], '')))
      .rejects.toThrow(JurisdictionConfigError);
    expect(await storage.getRecentScrapeRuns(10)).toEqual([]);
  });

  it('lists the implemented jurisdictions', () => {
    expect(getAvailableJurisdictions()).toEqual(['TX']);
  });
});

describe('mergeConfigs', () => {
  it('fills engine defaults and reuses seed cities as known cities', () => {
    const merged = mergeConfigs('TX', {
      name: 'Texas',
      baseUrl: 'https://bar.example.org',
      searchUrl: SEARCH_URL,
      barNumberLength: 8,
      seeds: { cities: ['Austin'], letters: 'ab' },
    }, 25);

    expect(merged.knownCities).toEqual(['Austin']);
    expect(merged.seeds.letters).toBe('AB');
    expect(merged.delays.betweenPages).toEqual({ minMs: 2000, maxMs: 3000 });
    expect(merged.selectors.resultBlocks).toEqual(['.attorney-result', '.member-listing', '.search-result']);
    expect(merged.maxPages).toBe(25);
  });
});

describe('TexasBarScraper', () => {
  it('enumerates cities first, then letters', async () => {
    const { impl } = fakeFetch(() => ({ body: '' }));
    const scraper = await createScraper('tx', { storage: new MemStorage(), client: testClient(impl) }, testRegistry(['Austin', 'Dallas'], 'AB'));

    expect(scraper.contexts.map(context => context.label)).toEqual(['City: Austin', 'City: Dallas', 'Letter: A', 'Letter: B']);
  });

  it('posts the directory search form for each context', async () => {
    const { impl, calls } = fakeFetch(() => ({ body: page([]) }));
    const scraper = await createScraper('TX', {
      storage: new MemStorage(),
      client: testClient(impl),
      sleep: noSleep,
    }, testRegistry(['Austin'], 'A'));

    await scraper.run();

    expect(calls.map(call => [call.method, call.url, call.body])).toEqual([
      ['POST', SEARCH_URL, 'City=Austin&State=TX&LastName=&FirstName=&BarNumber=&PracticeArea='],
      ['POST', SEARCH_URL, 'LastName=A&FirstName=&City=&BarNumber='],
    ]);
  });

  it('completes with errors when one context fails and keeps its siblings', async () => {
    const storage = new MemStorage();
    const { impl } = fakeFetch(request => searchedCity(request) === 'Dallas'
      ? { status: 503, body: '' }
      : { body: page([resultBlock('Jane Roe', '24000001', 'Austin'), resultBlock('John Doe', '24000002', 'Austin')]) });

    const scraper = await createScraper('TX', { storage, client: testClient(impl), concurrency: 2, sleep: noSleep }, testRegistry(['Dallas', 'Austin']));
    const summary = await scraper.run();

    expect(summary).toMatchObject({
      status: 'completed',
      notes: null,
      found: 2,
      added: 2,
      updated: 0,
      errors: 1,
      metadata: { contextsAttempted: 2, contextsCompleted: 1, contextsFailed: 1, contextsCancelled: 0, pagesFetched: 1 },
    });

    const run = await storage.getScrapeRun(summary.runId);
    expect(run).toMatchObject({ state: 'TX', status: 'completed', attorneysFound: 2, errors: 1 });
    expect(run?.completedAt).toBeInstanceOf(Date);
  });

  it('reports updates when overlapping searches return the same attorney', async () => {
    const { impl } = fakeFetch(() => ({ body: page([resultBlock('Jane Roe', '24000001', 'Austin')]) }));
    const scraper = await createScraper('TX', { storage: new MemStorage(), client: testClient(impl), sleep: noSleep }, testRegistry(['Austin'], 'R'));

    const summary = await scraper.run();

    expect(summary).toMatchObject({ found: 2, added: 1, updated: 1 });
  });

  it('marks a cancelled run as failed with accurate counts', async () => {
    const controller = new AbortController();
    const storage = new MemStorage();
    const { impl, calls } = fakeFetch(() => {
      controller.abort();
      return { body: page([resultBlock('Jane Roe', '24000001', 'Austin')]) };
    });
    const scraper = await createScraper('TX', { storage, client: testClient(impl), sleep: noSleep }, testRegistry(['Austin', 'Dallas'], 'AB'));

    const summary = await scraper.run({ signal: controller.signal });

    expect(calls).toHaveLength(1);
    expect(summary).toMatchObject({
      status: 'failed',
      notes: 'Cancelled',
      found: 1,
      metadata: { contextsAttempted: 1, contextsCompleted: 1, contextsCancelled: 3 },
    });
    expect(await storage.getScrapeRun(summary.runId)).toMatchObject({ status: 'failed', notes: 'Cancelled', attorneysFound: 1 });
  });
});
