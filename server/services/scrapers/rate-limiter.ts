export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface HostRateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function randomDelay(range: DelayRange, random: () => number = Math.random): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

/**
 * Politeness gate keyed by destination host.
 *
 * Each acquire() reserves the next free slot for its host synchronously and
 * then waits for it, so concurrent callers for one host are spaced at least
 * one interval apart while other hosts are never delayed.
 */
export class HostRateLimiter {
  private nextSlot = new Map<string, number>();
  private now: () => number;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(options: HostRateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  async acquire(host: string, interval: DelayRange): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + randomDelay(interval, this.random));

    const wait = slot - now;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}
