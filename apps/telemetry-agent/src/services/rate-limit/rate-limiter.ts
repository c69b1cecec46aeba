import type { MonotonicClock } from '@telemetry-relay/domain';
import { systemClock } from '@telemetry-relay/adapters';

/**
 * Allows an action at most once per `intervalSeconds`.
 * Each sink that needs throttling owns its own instance.
 */
export class RateLimiter {
  private lastTrigger: number | null = null;

  constructor(
    readonly intervalSeconds: number,
    private readonly clock: MonotonicClock = systemClock,
  ) {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(`rate limit interval must be positive, got ${intervalSeconds}`);
    }
  }

  /** Records the trigger and returns `true` if the interval has elapsed. */
  tryTrigger(): boolean {
    const now = this.clock.now();
    if (this.lastTrigger === null || now - this.lastTrigger >= this.intervalSeconds) {
      this.lastTrigger = now;
      return true;
    }
    return false;
  }

  /** The next `tryTrigger()` succeeds regardless of elapsed time. */
  reset(): void {
    this.lastTrigger = null;
  }

  /** `null` until the first successful trigger. */
  secondsSinceLastTrigger(): number | null {
    return this.lastTrigger === null ? null : this.clock.now() - this.lastTrigger;
  }

  timeToNextTrigger(): number {
    const elapsed = this.secondsSinceLastTrigger();
    if (elapsed === null) return 0;
    return Math.max(0, this.intervalSeconds - elapsed);
  }
}
