import type { Clock } from '../../src/shared/clock';
import { throwIfCancelled } from '../../src/shared/cancellation';

/**
 * Virtual time: `sleep` advances the clock instead of waiting.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    this.sleeps.push(ms);
    this.current += ms;
    await Promise.resolve();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
