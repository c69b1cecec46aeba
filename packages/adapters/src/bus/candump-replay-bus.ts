import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { BusError } from '@telemetry-relay/domain';
import type { BusConnection, BusConnector, MonotonicClock, RawFrame } from '@telemetry-relay/domain';
import { systemClock, wallClockSeconds } from '../clock/monotonic-clock.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('candump-replay');

// (1436509052.249713) vcan0 044#2A366C2A
const CANDUMP_LINE = /^\((\d+(?:\.\d+)?)\)\s+(\S+)\s+([0-9A-Fa-f]{1,8})#([0-9A-Fa-f]*)$/;

export interface CandumpEntry {
  readonly iface: string;
  readonly frame: RawFrame;
}

/** Parses one `candump -L` line. Remote and CAN FD frames are not supported and yield `null`. */
export function parseCandumpLine(line: string): CandumpEntry | null {
  const match = CANDUMP_LINE.exec(line.trim());
  if (!match) return null;
  const [, ts, iface, id, data] = match;
  if (ts === undefined || iface === undefined || id === undefined || data === undefined) return null;
  if (data.length % 2 !== 0 || data.length > 16) return null;

  const payload = new Uint8Array(data.length / 2);
  for (let i = 0; i < payload.length; i++) {
    payload[i] = parseInt(data.slice(i * 2, i * 2 + 2), 16);
  }
  return {
    iface,
    frame: { arbitrationId: parseInt(id, 16), payload, timestamp: Number(ts) },
  };
}

export interface CandumpLog {
  frames: RawFrame[];
  skippedLines: number;
}

export function parseCandumpLog(text: string, iface?: string): CandumpLog {
  const frames: RawFrame[] = [];
  let skippedLines = 0;
  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length === 0 || line.startsWith('#')) continue;
    const entry = parseCandumpLine(line);
    if (!entry) {
      skippedLines++;
      continue;
    }
    if (iface && entry.iface !== iface) continue;
    frames.push(entry.frame);
  }
  return { frames, skippedLines };
}

export interface CandumpReplayOptions {
  path: string;
  /** Only replay frames logged on this interface */
  iface?: string;
  /** 2 plays twice as fast as recorded */
  speed?: number;
  loop?: boolean;
  clock?: MonotonicClock;
}

class CandumpReplayConnection implements BusConnection {
  private index = 0;
  private closed = false;
  private startedAt: number;
  private logOrigin: number;

  constructor(
    readonly channelInfo: string,
    private readonly frames: RawFrame[],
    private readonly speed: number,
    private readonly loop: boolean,
    private readonly clock: MonotonicClock,
  ) {
    this.startedAt = clock.now();
    this.logOrigin = frames[0]?.timestamp ?? 0;
  }

  async receive(timeoutMs: number): Promise<RawFrame | null> {
    if (this.closed) throw new BusError(`${this.channelInfo} is shut down`);

    if (this.index >= this.frames.length) {
      if (!this.loop) {
        await delay(timeoutMs);
        return null;
      }
      this.index = 0;
      this.startedAt = this.clock.now();
    }

    const next = this.frames[this.index];
    if (!next) return null;
    const dueInMs =
      ((next.timestamp - this.logOrigin) / this.speed - (this.clock.now() - this.startedAt)) * 1_000;
    if (dueInMs > timeoutMs) {
      await delay(timeoutMs);
      return null;
    }
    if (dueInMs > 0) await delay(dueInMs);
    if (this.closed) throw new BusError(`${this.channelInfo} was shut down during receive`);

    this.index++;
    return { ...next, timestamp: wallClockSeconds() };
  }

  async shutdown(): Promise<void> {
    this.closed = true;
  }
}

/** Replays a `candump -L` capture with its recorded inter-frame timing. */
export class CandumpReplayConnector implements BusConnector {
  readonly description: string;
  private readonly speed: number;

  constructor(private readonly options: CandumpReplayOptions) {
    this.description = `candump:${options.path}`;
    this.speed = options.speed && options.speed > 0 ? options.speed : 1;
  }

  async open(): Promise<BusConnection> {
    let text: string;
    try {
      text = await readFile(this.options.path, 'utf-8');
    } catch (err) {
      throw new BusError(`cannot read ${this.options.path}: ${describeError(err)}`, { cause: err });
    }

    const { frames, skippedLines } = parseCandumpLog(text, this.options.iface);
    if (skippedLines > 0) {
      log.warn(`${this.options.path}: skipped ${skippedLines} unparsable line(s)`);
    }
    if (frames.length === 0) {
      throw new BusError(`${this.options.path} contains no replayable frames`);
    }

    log.info(`replaying ${frames.length} frames from ${this.options.path} at ${this.speed}x`);
    return new CandumpReplayConnection(
      this.description,
      frames,
      this.speed,
      this.options.loop ?? false,
      this.options.clock ?? systemClock,
    );
  }
}
