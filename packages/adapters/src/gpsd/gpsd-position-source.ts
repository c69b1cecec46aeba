import { Socket } from 'node:net';
import { z } from 'zod';
import type { MonotonicClock, PositionFix, PositionSource } from '@telemetry-relay/domain';
import { systemClock } from '../clock/monotonic-clock.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('gpsd');

const WATCH_COMMAND = '?WATCH={"enable":true,"json":true};\n';

const tpvSchema = z.object({
  class: z.literal('TPV'),
  mode: z.number().int(),
  time: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  alt: z.number().optional(),
  altHAE: z.number().optional(),
  speed: z.number().optional(),
  track: z.number().optional(),
});

const skySchema = z.object({
  class: z.literal('SKY'),
  hdop: z.number().optional(),
  uSat: z.number().int().optional(),
  satellites: z.array(z.object({ used: z.boolean().optional() })).optional(),
});

export interface GpsdOptions {
  host?: string;
  port?: number;
  /** Fixes older than this read as "no data" */
  maxFixAgeSeconds?: number;
  reconnectDelaySeconds?: number;
  clock?: MonotonicClock;
}

interface TimedFix {
  fix: PositionFix;
  receivedAt: number;
}

/**
 * Position source backed by a gpsd daemon's JSON watch stream.
 * Keeps only the latest 2D/3D fix; SKY reports fill in satellites and HDOP.
 */
export class GpsdPositionSource implements PositionSource {
  private readonly host: string;
  private readonly port: number;
  private readonly maxFixAgeSeconds: number;
  private readonly reconnectDelayMs: number;
  private readonly clock: MonotonicClock;

  private socket: Socket | null = null;
  private connected = false;
  private closing = false;
  private buffer = '';
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private latest: TimedFix | null = null;
  private satellites: number | undefined;
  private hdop: number | undefined;

  constructor(options: GpsdOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.port = options.port ?? 2947;
    this.maxFixAgeSeconds = options.maxFixAgeSeconds ?? 10;
    this.reconnectDelayMs = (options.reconnectDelaySeconds ?? 5) * 1_000;
    this.clock = options.clock ?? systemClock;
  }

  connect(): void {
    if (this.socket || this.closing) return;
    const socket = new Socket();
    this.socket = socket;
    socket.setEncoding('utf-8');

    socket.on('connect', () => {
      this.connected = true;
      log.info(`connected to gpsd at ${this.host}:${this.port}`);
      socket.write(WATCH_COMMAND);
    });
    socket.on('data', (chunk: string) => this.handleChunk(chunk));
    socket.on('error', (err) => {
      log.warn(`gpsd socket error: ${describeError(err)}`);
    });
    socket.on('close', () => {
      this.connected = false;
      this.socket = null;
      this.buffer = '';
      if (!this.closing) this.scheduleReconnect();
    });

    socket.connect(this.port, this.host);
  }

  isConnected(): boolean {
    return this.connected;
  }

  async getPosition(): Promise<PositionFix | null> {
    if (!this.latest) return null;
    const age = this.clock.now() - this.latest.receivedAt;
    if (age > this.maxFixAgeSeconds) {
      log.debug(`last fix is ${age.toFixed(1)}s old, treating as no fix`);
      return null;
    }
    return {
      ...this.latest.fix,
      ...(this.satellites !== undefined ? { satellites: this.satellites } : {}),
      ...(this.hdop !== undefined ? { hdop: this.hdop } : {}),
    };
  }

  /** Feeds one JSON report line from gpsd. */
  handleMessage(line: string): void {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      log.debug(`ignoring non-JSON line from gpsd: ${line.slice(0, 80)}`);
      return;
    }

    const tpv = tpvSchema.safeParse(message);
    if (tpv.success) {
      const report = tpv.data;
      // mode 2 = 2D fix, 3 = 3D fix
      if (report.mode < 2 || report.lat === undefined || report.lon === undefined) return;
      const altitude = report.altHAE ?? report.alt;
      const fixTime = report.time ? Date.parse(report.time) / 1_000 : undefined;
      this.latest = {
        receivedAt: this.clock.now(),
        fix: {
          latitude: report.lat,
          longitude: report.lon,
          ...(altitude !== undefined ? { altitude } : {}),
          ...(report.speed !== undefined ? { speed: report.speed } : {}),
          ...(report.track !== undefined ? { course: report.track } : {}),
          ...(fixTime !== undefined && Number.isFinite(fixTime) ? { fixTime } : {}),
        },
      };
      return;
    }

    const sky = skySchema.safeParse(message);
    if (sky.success) {
      const report = sky.data;
      if (report.hdop !== undefined) this.hdop = report.hdop;
      if (report.uSat !== undefined) {
        this.satellites = report.uSat;
      } else if (report.satellites) {
        this.satellites = report.satellites.filter((s) => s.used === true).length;
      }
    }
  }

  async close(): Promise<void> {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const socket = this.socket;
    if (!socket) return;
    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
      socket.destroy();
    });
    log.info('gpsd connection closed');
  }

  private handleChunk(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline >= 0) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line.length > 0) this.handleMessage(line);
      newline = this.buffer.indexOf('\n');
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    log.warn(`gpsd connection lost, retrying in ${this.reconnectDelayMs / 1_000}s`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, this.reconnectDelayMs);
  }
}
