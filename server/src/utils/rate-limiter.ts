/**
 * Minimum-interval gate shared by every worker that calls a throttled API.
 *
 * Each acquire() reserves the next free slot synchronously, so concurrent
 * callers are spaced at least intervalMs apart without a queue.
 */

import { sleep } from './retry.js';

export interface GateClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: GateClock = {
  now: () => Date.now(),
  sleep,
};

export interface RateGate {
  acquire(): Promise<void>;
}

export class IntervalGate implements RateGate {
  private nextSlot = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: GateClock = systemClock
  ) {}

  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }
  }
}
