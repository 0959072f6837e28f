/**
 * Admission gate shared by the HTTP sources: a per-minute request budget plus
 * a cap on requests in flight. SEC fair access allows about ten requests a
 * second; Wikidata asks for polite use.
 */

import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('rate_limiter');

const WINDOW_MS = 60_000;

export interface RateLimiterConfig {
  maxRequestsPerMinute: number;
  maxConcurrent: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private readonly limits: RateLimiterConfig;
  private startedAt: number[] = [];
  private inFlight = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(limits: Partial<RateLimiterConfig> = {}) {
    this.limits = {
      maxRequestsPerMinute: limits.maxRequestsPerMinute ?? 300,
      maxConcurrent: limits.maxConcurrent ?? 4,
    };
  }

  /** Runs task once admitted; the slot is freed however the task settles */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.enter();
    try {
      return await task();
    } finally {
      this.leave();
    }
  }

  getStats(): { requestsInLastMinute: number; activeRequests: number } {
    this.prune(Date.now());
    return { requestsInLastMinute: this.startedAt.length, activeRequests: this.inFlight };
  }

  private prune(now: number): void {
    const cutoff = now - WINDOW_MS;
    while (this.startedAt.length > 0 && this.startedAt[0] <= cutoff) {
      this.startedAt.shift();
    }
  }

  private async enter(): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.prune(now);

      if (this.inFlight >= this.limits.maxConcurrent) {
        await new Promise<void>((resolve) => this.waiting.push(resolve));
        continue;
      }

      if (this.startedAt.length >= this.limits.maxRequestsPerMinute) {
        const waitMs = this.startedAt[0] + WINDOW_MS - now;
        logger.debug({ waitMs }, 'Per-minute budget spent, waiting');
        await sleep(waitMs);
        continue;
      }

      // Check and claim happen in the same tick
      this.inFlight++;
      this.startedAt.push(now);
      return;
    }
  }

  private leave(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.waiting.shift()?.();
  }
}
