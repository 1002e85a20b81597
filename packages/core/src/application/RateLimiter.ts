import type { Clock } from '../domain/ports/Clock.js';
import { systemClock } from '../domain/ports/Clock.js';
import { Mutex } from './Mutex.js';

export interface RateLimitSettings {
  /** Bucket size: calls that may go out back to back. */
  readonly capacity: number;
  /** Tokens added per second. */
  readonly refillRate: number;
}

export interface RateLimiterOptions extends RateLimitSettings {
  /** Dependency name, for logs and stats. */
  readonly name?: string;
  readonly clock?: Clock;
}

/** Token bucket state as of the last refill. */
export interface RateLimiterState {
  readonly tokens: number;
  readonly capacity: number;
  readonly refillRate: number;
  readonly lastRefillTime: number;
}

export interface RateLimiterStats {
  readonly totalCalls: number;
  readonly totalWaitMs: number;
  readonly averageWaitMs: number;
  readonly currentTokens: number;
  readonly capacity: number;
}

/**
 * Token bucket bounding the call rate to one external dependency.
 *
 * Shared by every worker that calls the dependency, so the ceiling holds
 * regardless of worker count. All reads and writes of the bucket happen under
 * one mutex; waiters are served in the order they reached it.
 */
export class RateLimiter {
  readonly name: string;
  private readonly capacity: number;
  private readonly refillRate: number;
  private readonly clock: Clock;
  private readonly mutex = new Mutex();

  private tokens: number;
  private lastRefillTime: number;
  private totalCalls = 0;
  private totalWaitMs = 0;

  constructor(options: RateLimiterOptions) {
    if (!(options.capacity >= 1)) {
      throw new RangeError('Rate limiter capacity must be at least 1');
    }
    if (!(options.refillRate > 0)) {
      throw new RangeError('Rate limiter refill rate must be positive');
    }
    this.name = options.name ?? 'default';
    this.capacity = options.capacity;
    this.refillRate = options.refillRate;
    this.clock = options.clock ?? systemClock;
    this.tokens = options.capacity;
    this.lastRefillTime = this.clock.now();
  }

  /**
   * Take one token, waiting for the refill when the bucket is empty.
   *
   * @returns Milliseconds spent waiting for the refill (0 when a token was available).
   */
  acquire(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      this.refill();

      let waitedMs = 0;
      if (this.tokens < 1) {
        waitedMs = ((1 - this.tokens) / this.refillRate) * 1000;
        await this.clock.sleep(waitedMs);
        this.refill();
        // Timers may fire a fraction early.
        if (this.tokens < 1) this.tokens = 1;
      }

      this.tokens -= 1;
      this.totalCalls++;
      this.totalWaitMs += waitedMs;
      return waitedMs;
    });
  }

  state(): RateLimiterState {
    return {
      tokens: this.tokens,
      capacity: this.capacity,
      refillRate: this.refillRate,
      lastRefillTime: this.lastRefillTime,
    };
  }

  stats(): RateLimiterStats {
    return {
      totalCalls: this.totalCalls,
      totalWaitMs: this.totalWaitMs,
      averageWaitMs: this.totalCalls > 0 ? this.totalWaitMs / this.totalCalls : 0,
      currentTokens: this.tokens,
      capacity: this.capacity,
    };
  }

  resetStats(): void {
    this.totalCalls = 0;
    this.totalWaitMs = 0;
  }

  /** Must only be called while holding the mutex. */
  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefillTime) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefillTime = now;
  }
}
