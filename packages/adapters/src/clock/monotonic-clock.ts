import { performance } from 'node:perf_hooks';
import type { MonotonicClock } from '@telemetry-relay/domain';

/** Process monotonic clock in seconds. */
export const systemClock: MonotonicClock = {
  now: () => performance.now() / 1_000,
};

/**
 * Hand-driven clock for tests and replays.
 * Time only moves when `advance()` or `set()` is called.
 */
export class ManualClock implements MonotonicClock {
  private currentSeconds: number;

  constructor(startSeconds = 0) {
    this.currentSeconds = startSeconds;
  }

  now(): number {
    return this.currentSeconds;
  }

  advance(seconds: number): void {
    this.currentSeconds += seconds;
  }

  set(seconds: number): void {
    this.currentSeconds = seconds;
  }
}

/** Wall-clock epoch seconds. */
export function wallClockSeconds(): number {
  return Date.now() / 1_000;
}
