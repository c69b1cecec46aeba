/** Seconds on a clock that never jumps with wall-clock adjustments. */
export interface MonotonicClock {
  now(): number;
}
