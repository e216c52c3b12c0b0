import { RateLimiter } from '../../src/security/rate-limiter';

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 1_000_000;
    limiter = new RateLimiter(2, 60, () => now);
  });

  it('should allow up to the limit within a window', () => {
    expect(limiter.check('k')).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
    expect(limiter.check('k')).toEqual({ allowed: true, remaining: 0, retryAfterMs: 0 });
    now += 15_000;
    expect(limiter.check('k')).toEqual({ allowed: false, remaining: 0, retryAfterMs: 45_000 });
  });

  it('should track keys independently', () => {
    limiter.check('a');
    limiter.check('a');
    expect(limiter.check('a').allowed).toBe(false);
    expect(limiter.check('b').allowed).toBe(true);
  });

  it('should open a new window once the old one ends', () => {
    limiter.check('k');
    limiter.check('k');
    now += 60_000;
    expect(limiter.check('k')).toEqual({ allowed: true, remaining: 1, retryAfterMs: 0 });
  });

  it('should forget a key on reset', () => {
    limiter.check('k');
    limiter.check('k');
    limiter.reset('k');
    expect(limiter.check('k').allowed).toBe(true);
  });
});
