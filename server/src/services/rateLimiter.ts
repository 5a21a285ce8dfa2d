export interface RateLimiterOptions {
  /** When false, admit() always returns true and records nothing. */
  enabled: boolean;
  /** Requests allowed per window. */
  limit?: number;
  windowMs?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
}

/**
 * Exact sliding-window limiter keyed by client identity.
 *
 * Every call is recorded, including rejected ones, so a client that keeps
 * retrying while limited stays limited. Entries are pruned lazily when the
 * same identity comes back; identities that never return are not evicted.
 *
 * admit() is synchronous: prune, append and count run to completion on the
 * event loop, so two concurrent requests can never both see a stale count.
 */
export class SlidingWindowRateLimiter {
  readonly enabled: boolean;
  readonly limit: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly hits = new Map<string, number[]>();

  constructor(options: RateLimiterOptions) {
    this.enabled = options.enabled;
    this.limit = options.limit ?? 5;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  admit(identity: string): boolean {
    if (!this.enabled) return true;
    if (!identity) throw new TypeError('rate limiter identity must be a non-empty string');

    const now = this.now();
    const recent = (this.hits.get(identity) ?? []).filter((ts) => now - ts <= this.windowMs);
    recent.push(now);
    this.hits.set(identity, recent);

    return recent.length <= this.limit;
  }

  /** Number of identities currently tracked. */
  get size(): number {
    return this.hits.size;
  }
}
