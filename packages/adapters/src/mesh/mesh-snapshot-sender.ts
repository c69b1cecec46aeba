import { setTimeout as delay } from 'node:timers/promises';
import type { MeshSink, Snapshot } from '@telemetry-relay/domain';
import { serializeSnapshot } from '../serialization/snapshot-payload.js';
import { createLogger, describeError } from '../logging/logger.js';

const log = createLogger('mesh');

/** Largest data payload a mesh radio packet carries */
export const MESH_MAX_PAYLOAD_BYTES = 237;

export const MESH_BROADCAST = '^all';

export interface MeshPacketOptions {
  destination: string;
  portNum: number;
  channelIndex: number;
  wantAck: boolean;
}

/** Raised by a transport when the radio did not take the packet in time. Retried. */
export class MeshSendTimeoutError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MeshSendTimeoutError';
  }
}

/** The slice of a mesh radio interface the sender drives. */
export interface MeshTransport {
  readonly connected: boolean;
  /** Radio's own node id (`!a1b2c3d4`), once known */
  readonly nodeId: string | null;
  sendData(data: Uint8Array, options: MeshPacketOptions): Promise<void>;
  close(): Promise<void>;
}

export interface MeshSenderOptions {
  destination?: string;
  portNum: number;
  channelIndex?: number;
  maxPayloadBytes?: number;
  sendRetries?: number;
  sendRetryDelaySeconds?: number;
}

/**
 * Broadcasts snapshots as JSON over a mesh radio. Payloads above the packet
 * limit are refused up front; only transport timeouts are retried.
 */
export class MeshSnapshotSender implements MeshSink {
  private readonly packet: MeshPacketOptions;
  private readonly maxPayloadBytes: number;
  private readonly sendRetries: number;
  private readonly retryDelayMs: number;
  private closed = false;

  constructor(
    private readonly transport: MeshTransport,
    options: MeshSenderOptions,
  ) {
    this.packet = {
      destination: options.destination ?? MESH_BROADCAST,
      portNum: options.portNum,
      channelIndex: options.channelIndex ?? 0,
      wantAck: false,
    };
    this.maxPayloadBytes = options.maxPayloadBytes ?? MESH_MAX_PAYLOAD_BYTES;
    this.sendRetries = options.sendRetries ?? 2;
    this.retryDelayMs = (options.sendRetryDelaySeconds ?? 3) * 1_000;
  }

  get nodeId(): string | null {
    return this.isConnected() ? this.transport.nodeId : null;
  }

  isConnected(): boolean {
    return !this.closed && this.transport.connected;
  }

  async send(snapshot: Snapshot): Promise<boolean> {
    if (!this.isConnected()) {
      log.warn('not connected to mesh radio, cannot send');
      return false;
    }

    const data = Buffer.from(serializeSnapshot(snapshot), 'utf-8');
    if (data.byteLength > this.maxPayloadBytes) {
      log.error(`payload of ${data.byteLength} bytes exceeds the ${this.maxPayloadBytes} byte mesh limit, not sending`);
      return false;
    }

    const { destination, portNum } = this.packet;
    const attempts = this.sendRetries + 1;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.transport.sendData(data, this.packet);
        log.info(`sent ${data.byteLength} bytes to ${destination} on port ${portNum}`);
        return true;
      } catch (err) {
        if (!(err instanceof MeshSendTimeoutError)) {
          log.error(`mesh send failed: ${describeError(err)}`);
          return false;
        }
        log.warn(`mesh send timed out (attempt ${attempt}/${attempts})`);
        if (attempt < attempts) await delay(this.retryDelayMs);
      }
    }
    log.error('mesh send timed out on every attempt');
    return false;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
    log.info('mesh radio closed');
  }
}
