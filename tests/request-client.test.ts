import { describe, it, expect } from 'vitest';

import { HostRateLimiter } from '../server/services/scrapers/rate-limiter';
import { RequestClient, hostOf } from '../server/services/scrapers/request-client';
import { fakeFetch, noSleep, testClient } from './helpers';

describe('RequestClient', () => {
  it('returns a failure after exactly maxRetries attempts', async () => {
    const { impl, calls } = fakeFetch(() => ({ status: 503, body: 'unavailable' }));
    const backoff: number[] = [];
    const client = new RequestClient({
      maxRetries: 3,
      retryBaseDelayMs: 100,
      politeness: { minMs: 0, maxMs: 0 },
      rateLimiter: new HostRateLimiter({ sleep: noSleep }),
      fetchImpl: impl,
      sleep: async ms => { backoff.push(ms); },
    });

    const outcome = await client.fetch({ url: 'https://bar.example.org/search', method: 'GET' });

    expect(calls).toHaveLength(3);
    expect(backoff).toEqual([100, 200]);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.attempts).toBe(3);
    expect(outcome.failure.reason).toBe('http-status');
    expect(outcome.failure.status).toBe(503);
  });

  it('succeeds on a later attempt', async () => {
    let attempt = 0;
    const { impl } = fakeFetch(() => {
      attempt++;
      return attempt === 1 ? { status: 502, body: '' } : { body: '<p>ok</p>' };
    });

    const outcome = await testClient(impl).fetch({ url: 'https://bar.example.org/a', method: 'GET' });

    expect(outcome).toEqual({
      ok: true,
      attempts: 2,
      page: { url: 'https://bar.example.org/a', status: 200, body: '<p>ok</p>' },
    });
  });

  it('classifies thrown errors as network or timeout failures', async () => {
    const network = await testClient(async () => { throw new TypeError('fetch failed'); }, 1)
      .fetch({ url: 'https://bar.example.org/a', method: 'GET' });
    const timeout = await testClient(async () => { throw Object.assign(new Error('too slow'), { name: 'TimeoutError' }); }, 1)
      .fetch({ url: 'https://bar.example.org/a', method: 'GET' });

    expect(network.ok ? null : network.failure.reason).toBe('network');
    expect(timeout.ok ? null : timeout.failure.reason).toBe('timeout');
  });

  it('aborts a request that outlives the timeout and retries it', async () => {
    let calls = 0;
    const client = new RequestClient({
      maxRetries: 2,
      retryBaseDelayMs: 0,
      timeoutMs: 20,
      politeness: { minMs: 0, maxMs: 0 },
      rateLimiter: new HostRateLimiter({ sleep: noSleep }),
      sleep: noSleep,
      fetchImpl: (_input, init) => {
        calls++;
        return new Promise<Response>((_resolve, reject) => {
          const signal = init.signal;
          if (!signal) {
            reject(new Error('request sent without a signal'));
            return;
          }
          signal.addEventListener('abort', () => reject(signal.reason));
        });
      },
    });

    const outcome = await client.fetch({ url: 'https://bar.example.org/slow', method: 'GET' });

    expect(calls).toBe(2);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.reason).toBe('timeout');
    expect(outcome.failure.attempts).toBe(2);
  });

  it('sends POST parameters as a form body', async () => {
    const { impl, calls } = fakeFetch(() => ({ body: '' }));

    await testClient(impl).fetch({
      url: 'https://bar.example.org/search',
      method: 'POST',
      params: { City: 'San Antonio', State: 'TX' },
    });

    expect(calls).toEqual([
      { url: 'https://bar.example.org/search', method: 'POST', body: 'City=San+Antonio&State=TX' },
    ]);
  });

  it('appends GET parameters to the query string', async () => {
    const { impl, calls } = fakeFetch(() => ({ body: '' }));

    await testClient(impl).fetch({
      url: 'https://bar.example.org/search?page=2',
      method: 'GET',
      params: { LastName: 'A' },
    });

    expect(calls[0].url).toBe('https://bar.example.org/search?page=2&LastName=A');
  });

  it('fails without a request when the target is not a URL', async () => {
    const { impl, calls } = fakeFetch(() => ({ body: '' }));

    const outcome = await testClient(impl).fetch({ url: 'not a url', method: 'GET' });

    expect(calls).toHaveLength(0);
    expect(outcome.ok ? null : outcome.failure.attempts).toBe(0);
  });

  it('extracts the host used for rate limiting', () => {
    expect(hostOf('https://Bar.Example.org:8443/path')).toBe('bar.example.org:8443');
  });
});

describe('HostRateLimiter', () => {
  it('spaces requests to one host and leaves other hosts alone', async () => {
    const waits: Array<[string, number]> = [];
    let current = '';
    const limiter = new HostRateLimiter({
      now: () => 0,
      random: () => 0,
      sleep: async ms => { waits.push([current, ms]); },
    });
    const interval = { minMs: 1000, maxMs: 3000 };

    current = 'a';
    const first = limiter.acquire('a', interval);
    const second = limiter.acquire('a', interval);
    const third = limiter.acquire('a', interval);
    current = 'b';
    const other = limiter.acquire('b', interval);
    await Promise.all([first, second, third, other]);

    expect(waits).toEqual([['a', 1000], ['a', 2000]]);
  });
});
