import { Logger } from '../logger';
import { HostRateLimiter, sleep as defaultSleep, type DelayRange } from './rate-limiter';
import type { PageRequest } from './types';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface PageContent {
  url: string;
  status: number;
  body: string;
}

export type FailureReason = 'network' | 'timeout' | 'http-status';

export interface FetchFailure {
  url: string;
  attempts: number;
  reason: FailureReason;
  status?: number;
  message: string;
}

export type FetchOutcome =
  | { ok: true; page: PageContent; attempts: number }
  | { ok: false; failure: FetchFailure };

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface RequestClientOptions {
  maxRetries?: number;
  retryBaseDelayMs?: number;
  timeoutMs?: number;
  politeness?: DelayRange;
  userAgent?: string;
  rateLimiter?: HostRateLimiter;
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
}

function describeError(error: unknown): { reason: FailureReason; message: string } {
  // AbortSignal.timeout rejects with a DOMException named TimeoutError
  if (typeof error === 'object' && error !== null && 'name' in error &&
      (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return { reason: 'timeout', message: error instanceof Error ? error.message : String(error.name) };
  }
  return { reason: 'network', message: error instanceof Error ? error.message : String(error) };
}

export function hostOf(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return url;
  }
}

/**
 * HTTP GET/POST with per-host politeness, bounded retries and an absolute
 * timeout per attempt. Never throws: exhausted retries come back as a failure.
 */
export class RequestClient {
  readonly maxRetries: number;
  private retryBaseDelayMs: number;
  private timeoutMs: number;
  private politeness: DelayRange;
  private userAgent: string;
  private rateLimiter: HostRateLimiter;
  private fetchImpl: FetchImpl;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: RequestClientOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 2000;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.politeness = options.politeness ?? { minMs: 1000, maxMs: 2000 };
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.rateLimiter = options.rateLimiter ?? new HostRateLimiter();
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Copy of this client with a different politeness interval. The rate
   * limiter is shared, so hosts stay serialized across both clients.
   */
  withPoliteness(politeness: DelayRange): RequestClient {
    return new RequestClient({
      maxRetries: this.maxRetries,
      retryBaseDelayMs: this.retryBaseDelayMs,
      timeoutMs: this.timeoutMs,
      politeness,
      userAgent: this.userAgent,
      rateLimiter: this.rateLimiter,
      fetchImpl: this.fetchImpl,
      sleep: this.sleep,
    });
  }

  async fetch(request: PageRequest): Promise<FetchOutcome> {
    let prepared: { url: string; init: RequestInit };
    try {
      prepared = this.buildRequest(request);
    } catch (error) {
      const message = `Invalid request target ${request.url}: ${error instanceof Error ? error.message : error}`;
      await Logger.error(message, 'request-client');
      return { ok: false, failure: { url: request.url, attempts: 0, reason: 'network', message } };
    }

    const { url, init } = prepared;
    const host = hostOf(url);
    let failure: FetchFailure = { url, attempts: 0, reason: 'network', message: 'not attempted' };

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      await this.rateLimiter.acquire(host, this.politeness);

      try {
        const response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
        const body = await response.text();

        if (response.ok) {
          return { ok: true, attempts: attempt, page: { url: response.url || url, status: response.status, body } };
        }

        failure = {
          url,
          attempts: attempt,
          reason: 'http-status',
          status: response.status,
          message: `HTTP ${response.status} fetching ${url}`,
        };
      } catch (error) {
        failure = { url, attempts: attempt, ...describeError(error) };
      }

      if (attempt < this.maxRetries) {
        const delay = this.retryBaseDelayMs * Math.pow(2, attempt - 1);
        await Logger.warning(
          `${request.method} ${url} failed (${failure.message}), attempt ${attempt}/${this.maxRetries}, retrying in ${delay}ms`,
          'request-client'
        );
        await this.sleep(delay);
      }
    }

    await Logger.error(`All ${this.maxRetries} attempts failed for ${request.method} ${url}: ${failure.message}`, 'request-client');
    return { ok: false, failure };
  }

  private buildRequest(request: PageRequest): { url: string; init: RequestInit } {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      'Accept': 'text/html,application/xhtml+xml',
      ...request.headers,
    };
    const params = new URLSearchParams(request.params ?? {});

    if (request.method === 'POST') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      return { url: request.url, init: { method: 'POST', headers, body: params.toString(), redirect: 'follow' } };
    }

    const target = new URL(request.url);
    params.forEach((value, key) => target.searchParams.set(key, value));
    return { url: target.toString(), init: { method: 'GET', headers, redirect: 'follow' } };
  }
}
