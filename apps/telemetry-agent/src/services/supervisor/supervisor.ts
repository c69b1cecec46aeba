import type { Closeable } from '@telemetry-relay/domain';
import { createLogger, describeError } from '@telemetry-relay/adapters';
import type { BusListener } from '../bus/bus-listener.js';
import type { Aggregator } from '../aggregation/aggregator.js';
import type { StopSignal } from '../shared/stop-signal.js';

const log = createLogger('supervisor');

/** Added to the data interval when waiting for the aggregation loop to exit */
const AGGREGATOR_JOIN_MARGIN_SECONDS = 5;

export interface ManagedResource {
  readonly name: string;
  readonly resource: Closeable;
}

export interface SupervisorOptions {
  dataIntervalSeconds: number;
}

/**
 * Starts and stops the bus listener and the aggregation loop, then releases
 * collaborators in reverse registration order.
 */
export class Supervisor {
  private readonly resources: ManagedResource[] = [];
  private readonly closed = new Set<string>();
  private running = false;

  constructor(
    private readonly stopSignal: StopSignal,
    private readonly aggregator: Aggregator,
    private readonly busListener: BusListener | null,
    private readonly options: SupervisorOptions,
  ) {}

  /** Registration order is dependency order; resources are closed last-registered first. */
  register(name: string, resource: Closeable): this {
    this.resources.push({ name, resource });
    return this;
  }

  isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      log.warn('already running');
      return;
    }
    log.info('starting');
    this.stopSignal.clear();
    // a restart reopens collaborators, so the next stop() must close them again
    this.closed.clear();

    const listener = this.busListener;
    if (listener) {
      if (listener.isConnected() || (listener.state !== 'terminated' && (await listener.connect()))) {
        listener.start();
      } else {
        log.warn('bus listener unavailable, continuing without bus data');
      }
    }

    this.aggregator.start();
    this.running = true;
    log.info('started');
  }

  async stop(): Promise<void> {
    log.info('stopping');
    this.stopSignal.set();

    // producer first, so nothing is queued after the aggregator's last drain
    if (this.busListener) await this.busListener.stop();

    const joinTimeout = this.options.dataIntervalSeconds + AGGREGATOR_JOIN_MARGIN_SECONDS;
    if (!(await this.aggregator.join(joinTimeout))) {
      log.warn(`aggregation loop did not stop within ${joinTimeout}s`);
    }
    this.running = false;

    for (const { name, resource } of [...this.resources].reverse()) {
      if (this.closed.has(name)) continue;
      this.closed.add(name);
      try {
        await resource.close();
        log.info(`closed ${name}`);
      } catch (err) {
        log.error(`error closing ${name}: ${describeError(err)}`);
      }
    }
    log.info('stopped');
  }
}
