import { parseJurisdictions, type JurisdictionRegistry } from '../server/config';
import { HostRateLimiter } from '../server/services/scrapers/rate-limiter';
import { RequestClient, type FetchImpl } from '../server/services/scrapers/request-client';

export const noSleep = async (_ms: number): Promise<void> => {};

export interface RecordedRequest {
  url: string;
  method: string;
  body: string;
}

/**
 * Fake fetch answering from a handler; every call is recorded.
 */
export function fakeFetch(handler: (request: RecordedRequest) => { status?: number; body: string }) {
  const calls: RecordedRequest[] = [];
  const impl: FetchImpl = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? init.body : '',
    };
    calls.push(request);
    const { status = 200, body } = handler(request);
    return new Response(body, { status });
  };
  return { impl, calls };
}

export function testClient(fetchImpl: FetchImpl, maxRetries = 3): RequestClient {
  return new RequestClient({
    maxRetries,
    retryBaseDelayMs: 10,
    timeoutMs: 1000,
    politeness: { minMs: 0, maxMs: 0 },
    rateLimiter: new HostRateLimiter({ sleep: noSleep }),
    fetchImpl,
    sleep: noSleep,
  });
}

export const SEARCH_URL = 'https://bar.example.org/search';

export function testRegistry(cities: string[], letters = ''): JurisdictionRegistry {
  return parseJurisdictions({
    TX: {
      name: 'Texas',
      baseUrl: 'https://bar.example.org',
      searchUrl: SEARCH_URL,
      barNumberLength: 8,
      seeds: { cities, letters },
      knownCities: ['Austin', 'Dallas', 'Houston', 'San Antonio'],
      delays: {
        politeness: { minMs: 0, maxMs: 0 },
        betweenPages: { minMs: 0, maxMs: 0 },
      },
    },
  });
}

export function resultBlock(name: string, barNumber: string, city: string, extra = ''): string {
  return `<div class="attorney-result"><h3>${name}</h3><p>Bar No: ${barNumber}</p><p>${city}</p>${extra}</div>`;
}

export function page(blocks: string[], nextHref?: string): string {
  const next = nextHref ? `<div class="pager"><a href="${nextHref}">Next »</a></div>` : '';
  return `<html><body><div id="content">${blocks.join('\n')}</div>${next}</body></html>`;
}
