import { ExponentialBackoff, remainingMs } from '../backoff';

describe('ExponentialBackoff', () => {
  it('should double from the initial delay', () => {
    const backoff = new ExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 10_000 });

    expect([1, 2, 3, 4].map((attempt) => backoff.delayFor(attempt))).toEqual([100, 200, 400, 800]);
  });

  it('should cap at the maximum delay', () => {
    const backoff = new ExponentialBackoff({ initialDelayMs: 1000, maxDelayMs: 15_000 });

    expect(backoff.delayFor(5)).toBe(15_000);
    expect(backoff.delayFor(30)).toBe(15_000);
  });

  it('should honour a custom multiplier', () => {
    const backoff = new ExponentialBackoff({ initialDelayMs: 10, maxDelayMs: 1000, multiplier: 3 });

    expect(backoff.delayFor(3)).toBe(90);
  });

  it('should treat attempts below one as the first', () => {
    const backoff = new ExponentialBackoff({ initialDelayMs: 50, maxDelayMs: 1000 });

    expect(backoff.delayFor(0)).toBe(50);
  });
});

describe('remainingMs', () => {
  it('should never go negative', () => {
    expect(remainingMs(1000, 400)).toBe(600);
    expect(remainingMs(1000, 1500)).toBe(0);
  });
});
