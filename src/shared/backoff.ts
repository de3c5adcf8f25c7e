export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
}

/**
 * Bounded exponential backoff: `initial * multiplier^(attempt - 1)`, capped at `maxDelayMs`.
 */
export class ExponentialBackoff {
  private readonly multiplier: number;

  constructor(private readonly options: BackoffOptions) {
    this.multiplier = options.multiplier ?? 2;
  }

  /**
   * Delay to wait after the given attempt (1-based) failed.
   */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const raw = this.options.initialDelayMs * Math.pow(this.multiplier, exponent);
    return Math.min(raw, this.options.maxDelayMs);
  }
}

/**
 * Milliseconds left before `deadline`, never negative.
 */
export function remainingMs(deadline: number, now: number): number {
  return Math.max(0, deadline - now);
}
