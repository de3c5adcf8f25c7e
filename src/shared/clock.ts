import { Injectable } from '@nestjs/common';
import { setTimeout as delay } from 'node:timers/promises';
import { OperationCancelledError } from './cancellation';

export const CLOCK = Symbol('CLOCK');

/**
 * Time source used by every retry and polling loop.
 * Tests substitute a virtual clock so backoff and timeouts run without real delays.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

@Injectable()
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError();
      }
      throw error;
    }
  }
}
