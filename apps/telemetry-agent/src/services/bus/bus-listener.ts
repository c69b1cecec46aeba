import { BusError } from '@telemetry-relay/domain';
import type {
  BusConnection,
  BusConnector,
  BusListenerState,
  BusListenerStats,
  RawFrame,
} from '@telemetry-relay/domain';
import { createLogger, describeError } from '@telemetry-relay/adapters';
import type { SignalCatalog } from '../signals/signal-catalog.js';
import { decodeFrame } from '../signals/frame-decoder.js';
import type { SampleQueue } from './sample-queue.js';
import { settlesWithin } from '../shared/stop-signal.js';
import type { StopSignal } from '../shared/stop-signal.js';

const log = createLogger('bus-listener');

/** Extra time allowed for the receive loop to notice the stop signal */
const JOIN_GRACE_SECONDS = 1;
/** Pause after an unexpected (non-bus) error in the receive loop */
const UNEXPECTED_ERROR_PAUSE_SECONDS = 1;

export interface BusListenerOptions {
  connectionRetries: number;
  retryDelaySeconds: number;
  receiveTimeoutSeconds: number;
}

function formatPayload(payload: Uint8Array): string {
  return [...payload].map((b) => b.toString(16).padStart(2, '0').toUpperCase()).join(' ');
}

/**
 * Owns the bus connection and the receive loop that feeds decoded samples into
 * the sample queue.
 *
 * Startup retries `connectionRetries` times. At runtime a bus fault gets exactly
 * one reconnect attempt; if that fails the listener is `terminated` for good.
 */
export class BusListener {
  private connection: BusConnection | null = null;
  private _state: BusListenerState = 'disconnected';
  private loop: Promise<void> | null = null;

  private framesReceived = 0;
  private samplesDecoded = 0;
  private samplesDropped = 0;

  constructor(
    private readonly connector: BusConnector,
    private readonly catalog: SignalCatalog,
    private readonly queue: SampleQueue,
    private readonly stopSignal: StopSignal,
    private readonly options: BusListenerOptions,
  ) {}

  get state(): BusListenerState {
    return this._state;
  }

  isConnected(): boolean {
    return this._state === 'connected' && this.connection !== null;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  stats(): BusListenerStats {
    return {
      state: this._state,
      framesReceived: this.framesReceived,
      samplesDecoded: this.samplesDecoded,
      samplesDropped: this.samplesDropped,
    };
  }

  /** Resolves `true` once connected, `false` when every attempt failed or stop was requested. */
  async connect(): Promise<boolean> {
    this._state = 'connecting';
    return this.openWithRetries(this.options.connectionRetries);
  }

  private async openWithRetries(retries: number): Promise<boolean> {
    const { retryDelaySeconds } = this.options;

    for (let attempt = 1; attempt <= retries + 1; attempt++) {
      log.info(`connecting to ${this.connector.description} (attempt ${attempt}/${retries + 1})`);
      try {
        this.connection = await this.connector.open();
        this._state = 'connected';
        log.info(`connected to ${this.connection.channelInfo}`);
        return true;
      } catch (err) {
        log.error(`connection attempt ${attempt} failed: ${describeError(err)}`);
      }

      if (attempt <= retries) {
        log.info(`retrying in ${retryDelaySeconds}s`);
        if (await this.stopSignal.wait(retryDelaySeconds)) {
          log.info('connection retries aborted by stop signal');
          break;
        }
      }
    }

    this._state = 'terminated';
    log.error(`could not connect to ${this.connector.description}, bus data unavailable`);
    return false;
  }

  /** Starts the receive loop in the background. No-op unless connected and idle. */
  start(): void {
    if (!this.isConnected()) {
      log.warn('bus not connected, receive loop not started');
      return;
    }
    if (this.loop) {
      log.warn('receive loop already running');
      return;
    }
    const loop = this.run();
    this.loop = loop;
    void loop
      .catch((err) => log.error(`receive loop crashed: ${describeError(err)}`))
      .finally(() => {
        if (this.loop === loop) this.loop = null;
      });
  }

  private async run(): Promise<void> {
    log.info('receive loop started');
    const timeoutMs = this.options.receiveTimeoutSeconds * 1_000;

    while (!this.stopSignal.isSet && this.isConnected() && this.connection) {
      try {
        const frame = await this.connection.receive(timeoutMs);
        if (frame) this.handleFrame(frame);
      } catch (err) {
        if (err instanceof BusError) {
          if (this.stopSignal.isSet) break;
          log.error(`bus error: ${err.message}, attempting to reconnect`);
          if (!(await this.reconnect())) {
            log.error('reconnect failed, receive loop exiting');
            break;
          }
        } else {
          log.error(`unexpected error in receive loop: ${describeError(err)}`);
          if (await this.stopSignal.wait(UNEXPECTED_ERROR_PAUSE_SECONDS)) break;
        }
      }
    }

    log.info('receive loop stopped');
  }

  private handleFrame(frame: RawFrame): void {
    this.framesReceived++;
    log.debug(
      `rx id=0x${frame.arbitrationId.toString(16).toUpperCase()} dlc=${frame.payload.length} data=${formatPayload(frame.payload)}`,
    );
    for (const sample of decodeFrame(frame, this.catalog)) {
      this.samplesDecoded++;
      if (!this.queue.offer(sample)) {
        this.samplesDropped++;
        log.warn(`sample queue full (${this.queue.capacity}), dropping '${sample.name}'`);
      }
    }
  }

  /** A single open attempt; the startup retry budget is not reused at runtime. */
  private async reconnect(): Promise<boolean> {
    this._state = 'reconnecting';
    await this.releaseConnection();
    return this.openWithRetries(0);
  }

  private async releaseConnection(): Promise<void> {
    const conn = this.connection;
    this.connection = null;
    if (!conn) return;
    try {
      await conn.shutdown();
    } catch (err) {
      log.error(`error shutting down bus: ${describeError(err)}`);
    }
  }

  async stop(): Promise<void> {
    this.stopSignal.set();
    const loop = this.loop;
    if (!loop) return;
    log.info('stopping receive loop');
    const joined = await settlesWithin(loop, this.options.receiveTimeoutSeconds + JOIN_GRACE_SECONDS);
    if (!joined) log.warn('receive loop did not stop in time');
  }

  async close(): Promise<void> {
    await this.stop();
    if (this.connection) {
      log.info('shutting down bus interface');
      await this.releaseConnection();
    }
    if (this._state !== 'terminated') this._state = 'disconnected';
  }
}
