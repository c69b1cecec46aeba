/** A frame as handed over by the bus driver. Payload is 0–8 bytes. */
export interface RawFrame {
  readonly arbitrationId: number;
  readonly payload: Uint8Array;
  /** Seconds, as stamped by the driver */
  readonly timestamp: number;
}
