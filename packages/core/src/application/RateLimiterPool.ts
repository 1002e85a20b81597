import type { Clock } from '../domain/ports/Clock.js';
import { RateLimiter } from './RateLimiter.js';
import type { RateLimitSettings, RateLimiterStats } from './RateLimiter.js';

/** One shared limiter per external dependency, built from configuration. */
export class RateLimiterPool {
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(settings: Readonly<Record<string, RateLimitSettings>> = {}, clock?: Clock) {
    for (const [name, limit] of Object.entries(settings)) {
      this.limiters.set(name, new RateLimiter({ ...limit, name, ...(clock ? { clock } : {}) }));
    }
  }

  get(dependency: string): RateLimiter {
    const limiter = this.limiters.get(dependency);
    if (!limiter) {
      throw new Error(`No rate limiter configured for dependency '${dependency}'`);
    }
    return limiter;
  }

  /** Rejects, rather than throws, for an unknown dependency. */
  async acquire(dependency: string): Promise<number> {
    return this.get(dependency).acquire();
  }

  stats(): Readonly<Record<string, RateLimiterStats>> {
    const out: Record<string, RateLimiterStats> = {};
    for (const [name, limiter] of this.limiters) {
      out[name] = limiter.stats();
    }
    return out;
  }
}
