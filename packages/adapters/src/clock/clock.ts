import type { ClockPort } from '@uwb-locator/domain';

/** Wall-clock implementation used by the running service. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Deterministic clock for tests and replays.
 * Returns the same instant until moved with `advance`.
 */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(epoch: Date | number) {
    this.currentMs = typeof epoch === 'number' ? epoch : epoch.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}
