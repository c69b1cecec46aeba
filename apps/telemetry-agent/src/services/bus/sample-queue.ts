import type { DecodedSample } from '@telemetry-relay/domain';

/**
 * Bounded FIFO between the bus listener and the aggregator.
 *
 * Delivery is at-most-once with latest-value semantics downstream: when full,
 * `offer()` rejects the incoming sample instead of blocking the bus reader.
 */
export class SampleQueue {
  private items: DecodedSample[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  offer(sample: DecodedSample): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(sample);
    return true;
  }

  /** Removes and returns everything queued, oldest first. */
  drain(): DecodedSample[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
