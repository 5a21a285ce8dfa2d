import { describe, it, expect } from 'vitest';
import { SlidingWindowRateLimiter } from '../services/rateLimiter';

function limiterAt(start = 0, options: { limit?: number; windowMs?: number } = {}) {
  const clock = { now: start };
  const limiter = new SlidingWindowRateLimiter({ enabled: true, now: () => clock.now, ...options });
  return { limiter, clock };
}

describe('SlidingWindowRateLimiter', () => {
  it('defaults to 5 requests per minute', () => {
    const limiter = new SlidingWindowRateLimiter({ enabled: true });
    expect(limiter.limit).toBe(5);
    expect(limiter.windowMs).toBe(60_000);
  });

  it('admits exactly `limit` calls and rejects the next one in the same window', () => {
    const { limiter } = limiterAt();
    const results = Array.from({ length: 6 }, () => limiter.admit('198.51.100.1'));
    expect(results).toEqual([true, true, true, true, true, false]);
  });

  it('admits again once the window has elapsed', () => {
    const { limiter, clock } = limiterAt();
    for (let i = 0; i < 6; i++) limiter.admit('198.51.100.1');

    clock.now = 60_001;
    expect(limiter.admit('198.51.100.1')).toBe(true);
  });

  it('keeps timestamps exactly one window old', () => {
    const { limiter, clock } = limiterAt();
    for (let i = 0; i < 5; i++) limiter.admit('198.51.100.1');

    clock.now = 60_000;
    expect(limiter.admit('198.51.100.1')).toBe(false);
  });

  it('counts rejected attempts against later calls', () => {
    const { limiter, clock } = limiterAt();
    for (let i = 0; i < 5; i++) expect(limiter.admit('198.51.100.1')).toBe(true);

    clock.now = 50_000;
    for (let i = 0; i < 3; i++) expect(limiter.admit('198.51.100.1')).toBe(false);

    // The five t=0 hits expire; the three rejected t=50s hits do not
    clock.now = 60_001;
    expect(limiter.admit('198.51.100.1')).toBe(true);
    clock.now = 60_002;
    expect(limiter.admit('198.51.100.1')).toBe(true);
    clock.now = 60_003;
    expect(limiter.admit('198.51.100.1')).toBe(false);
  });

  it('tracks identities independently', () => {
    const { limiter } = limiterAt(0, { limit: 1 });
    expect(limiter.admit('198.51.100.1')).toBe(true);
    expect(limiter.admit('198.51.100.1')).toBe(false);
    expect(limiter.admit('198.51.100.2')).toBe(true);
    expect(limiter.size).toBe(2);
  });

  it('honours a custom limit and window', () => {
    const { limiter, clock } = limiterAt(0, { limit: 2, windowMs: 1_000 });
    expect(limiter.admit('a')).toBe(true);
    expect(limiter.admit('a')).toBe(true);
    expect(limiter.admit('a')).toBe(false);
    clock.now = 1_001;
    expect(limiter.admit('a')).toBe(true);
  });

  it('always admits and records nothing when disabled', () => {
    const limiter = new SlidingWindowRateLimiter({ enabled: false, limit: 1 });
    for (let i = 0; i < 20; i++) expect(limiter.admit('198.51.100.1')).toBe(true);
    expect(limiter.size).toBe(0);
  });

  it('rejects an empty identity as a programming error', () => {
    const { limiter } = limiterAt();
    expect(() => limiter.admit('')).toThrow(TypeError);
  });
});
