import type { RawFrame } from '../../entities/raw-frame.js';

/** Raised by bus drivers for faults on the link itself (not for bad payloads). */
export class BusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BusError';
  }
}

export interface BusConnection {
  readonly channelInfo: string;
  /** Resolves with `null` when nothing arrived within `timeoutMs`. */
  receive(timeoutMs: number): Promise<RawFrame | null>;
  shutdown(): Promise<void>;
}

export interface BusConnector {
  readonly description: string;
  open(): Promise<BusConnection>;
}
