/**
 * Shared request budget for the battle-log API
 *
 * Every subject's fetches go through one RateLimiter instance, so the sum of
 * all polling never exceeds the API's tolerance:
 * 1. Sliding window: at most `maxRequestsPerWindow` per `windowMs`
 * 2. Minimum spacing of `minIntervalMs` between requests
 * 3. FIFO queue, so subjects waiting for permission are served round-robin
 *
 * Permission covers the start of a request only. A request settles outside
 * the queue, so a slow response never holds up the next subject's turn.
 *
 * A RateLimited response can pause the whole budget via `pauseFor()`.
 * Retrying is the caller's job.
 */

import { Logger } from './Logger';

export interface RateLimitConfig {
  maxRequestsPerWindow: number;
  windowMs: number;
  minIntervalMs: number;
}

interface QueuedRequest {
  run: () => Promise<void>;
  reject: (error: Error) => void;
  description: string;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  maxRequestsPerWindow: 20,
  windowMs: 10000,
  minIntervalMs: 2000,
};

export class RateLimiterStoppedError extends Error {
  constructor(description: string) {
    super(`Rate limiter stopped before "${description}" could run`);
    this.name = 'RateLimiterStoppedError';
  }
}

export class RateLimiter {
  private requestHistory: number[] = [];
  private lastRequestTime = 0;
  private pausedUntil = 0;
  private queue: QueuedRequest[] = [];
  private processing = false;
  private config: RateLimitConfig;
  private logger = new Logger('RateLimiter');
  private stats = { requests: 0, failures: 0, pauses: 0 };

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
    if (this.config.maxRequestsPerWindow < 1 || this.config.windowMs < 1) {
      throw new Error(
        `Rate limit needs at least 1 request per window of at least 1ms, got ` +
          `${this.config.maxRequestsPerWindow} per ${this.config.windowMs}ms`,
      );
    }
  }

  /**
   * Time to wait before the next request is allowed
   */
  private getWaitTime(): number {
    const now = Date.now();

    if (this.pausedUntil > now) {
      return this.pausedUntil - now;
    }

    const timeSinceLastRequest = now - this.lastRequestTime;
    if (timeSinceLastRequest < this.config.minIntervalMs) {
      return this.config.minIntervalMs - timeSinceLastRequest;
    }

    const windowStart = now - this.config.windowMs;
    const recentRequests = this.requestHistory.filter((t) => t > windowStart);
    if (recentRequests.length >= this.config.maxRequestsPerWindow) {
      // Wait until oldest request expires from window
      return Math.min(...recentRequests) + this.config.windowMs - now + 1;
    }

    return 0;
  }

  private recordRequest(): void {
    const now = Date.now();
    this.requestHistory.push(now);
    this.lastRequestTime = now;
    this.stats.requests++;

    const cutoff = now - this.config.windowMs;
    this.requestHistory = this.requestHistory.filter((t) => t > cutoff);
  }

  /**
   * Run `fn` once the shared budget allows it.
   */
  execute<T>(fn: () => Promise<T>, description: string = 'request'): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          resolve(await fn());
        },
        reject,
        description,
      });
      this.processQueue().catch((err) => {
        this.logger.error('Queue processing failed', err);
      });
    });
  }

  /**
   * Hold every queued request for `ms` (e.g. a server Retry-After hint).
   */
  pauseFor(ms: number): void {
    const until = Date.now() + ms;
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
      this.stats.pauses++;
      this.logger.warn(`Pausing outbound requests for ${ms}ms`);
    }
  }

  /**
   * Reject every request that has not started yet.
   */
  clear(): void {
    const pending = this.queue.splice(0);
    for (const request of pending) {
      request.reject(new RateLimiterStoppedError(request.description));
    }
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const waitTime = this.getWaitTime();
        if (waitTime > 0) {
          await this.sleep(waitTime);
          continue;
        }

        const request = this.queue.shift();
        if (!request) break;

        this.recordRequest();
        this.launch(request);
      }
    } finally {
      this.processing = false;
    }
  }

  private launch(request: QueuedRequest): void {
    request.run().catch((error: unknown) => {
      this.stats.failures++;
      request.reject(error instanceof Error ? error : new Error(String(error)));
    });
  }

  getStats(): { requests: number; failures: number; pauses: number; queueLength: number } {
    return { ...this.stats, queueLength: this.queue.length };
  }

  getWindowRequestCount(): number {
    const windowStart = Date.now() - this.config.windowMs;
    return this.requestHistory.filter((t) => t > windowStart).length;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
