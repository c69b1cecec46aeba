import { hasSnapshotData, isUsableFix } from '@telemetry-relay/domain';
import type {
  DiagnosticReading,
  DiagnosticSource,
  MeshSink,
  MessageBusSink,
  MonotonicClock,
  PositionFix,
  PositionSource,
  Snapshot,
  TrackingSink,
} from '@telemetry-relay/domain';
import { createLogger, describeError, systemClock, wallClockSeconds } from '@telemetry-relay/adapters';
import type { SampleQueue } from '../bus/sample-queue.js';
import type { RateLimiter } from '../rate-limit/rate-limiter.js';
import { settlesWithin } from '../shared/stop-signal.js';
import type { StopSignal } from '../shared/stop-signal.js';

const log = createLogger('aggregator');

/** Lower bound on the end-of-cycle sleep, so an overrunning cycle cannot spin */
const MIN_SLEEP_SECONDS = 0.1;
const MAX_ERROR_BACKOFF_SECONDS = 5;

export type SinkName = 'mesh' | 'messageBus' | 'tracking';
export type DispatchOutcome = 'sent' | 'failed' | 'skipped';

export interface AggregatorSources {
  position?: PositionSource;
  diagnostics?: DiagnosticSource;
}

export interface AggregatorSinks {
  mesh?: MeshSink;
  messageBus?: MessageBusSink;
  tracking?: { sink: TrackingSink; limiter: RateLimiter };
}

export interface AggregatorOptions {
  deviceId: string;
  dataIntervalSeconds: number;
  /** Sub-topic for message-bus publishes */
  messageBusSubTopic?: string;
  clock?: MonotonicClock;
  /** Epoch seconds for snapshot timestamps */
  wallClock?: () => number;
}

export interface CycleResult {
  /** `null` when the cycle had nothing to report */
  snapshot: Snapshot | null;
  dispatch: Partial<Record<SinkName, DispatchOutcome>>;
}

export type SinkCounters = Record<DispatchOutcome, number>;

export interface AggregatorStats {
  cycles: number;
  snapshotsDispatched: number;
  snapshotsDiscarded: number;
  cycleFaults: number;
  lastSnapshotTs: number | null;
  sinks: Record<SinkName, SinkCounters>;
}

const EMPTY_READING: DiagnosticReading = { sensors: {}, dtcs: [] };

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  Object.freeze(snapshot.sensors);
  Object.freeze(snapshot.busSignals);
  Object.freeze(snapshot.dtcs);
  if (snapshot.gps) Object.freeze(snapshot.gps);
  return Object.freeze(snapshot);
}

/**
 * Periodic loop that merges queued bus samples with position and diagnostic
 * readings into one snapshot per cycle and fans it out to the sinks.
 */
export class Aggregator {
  private readonly clock: MonotonicClock;
  private readonly wallClock: () => number;
  private readonly subTopic: string;

  private loop: Promise<void> | null = null;
  private lastTimestamp: number | null = null;
  private lastSnapshot: Snapshot | null = null;

  private cycles = 0;
  private snapshotsDispatched = 0;
  private snapshotsDiscarded = 0;
  private cycleFaults = 0;
  private readonly sinkCounters: Record<SinkName, SinkCounters> = {
    mesh: { sent: 0, failed: 0, skipped: 0 },
    messageBus: { sent: 0, failed: 0, skipped: 0 },
    tracking: { sent: 0, failed: 0, skipped: 0 },
  };

  constructor(
    private readonly queue: SampleQueue,
    private readonly stopSignal: StopSignal,
    private readonly sources: AggregatorSources,
    private readonly sinks: AggregatorSinks,
    private readonly options: AggregatorOptions,
  ) {
    if (!(options.dataIntervalSeconds > 0)) {
      throw new RangeError(`data interval must be positive, got ${options.dataIntervalSeconds}`);
    }
    this.clock = options.clock ?? systemClock;
    this.wallClock = options.wallClock ?? wallClockSeconds;
    this.subTopic = options.messageBusSubTopic ?? 'sensors';
  }

  latestSnapshot(): Snapshot | null {
    return this.lastSnapshot;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  stats(): AggregatorStats {
    return {
      cycles: this.cycles,
      snapshotsDispatched: this.snapshotsDispatched,
      snapshotsDiscarded: this.snapshotsDiscarded,
      cycleFaults: this.cycleFaults,
      lastSnapshotTs: this.lastSnapshot?.timestampUtc ?? null,
      sinks: {
        mesh: { ...this.sinkCounters.mesh },
        messageBus: { ...this.sinkCounters.messageBus },
        tracking: { ...this.sinkCounters.tracking },
      },
    };
  }

  start(): void {
    if (this.loop) {
      log.warn('aggregation loop already running');
      return;
    }
    const loop = this.run();
    this.loop = loop;
    void loop
      .catch((err) => log.error(`aggregation loop crashed: ${describeError(err)}`))
      .finally(() => {
        if (this.loop === loop) this.loop = null;
      });
  }

  /** Waits for the loop to exit after the stop signal is set. `false` on timeout. */
  async join(timeoutSeconds: number): Promise<boolean> {
    const loop = this.loop;
    if (!loop) return true;
    return settlesWithin(loop, timeoutSeconds);
  }

  private errorBackoffSeconds(): number {
    return Math.min(MAX_ERROR_BACKOFF_SECONDS, this.options.dataIntervalSeconds / 2);
  }

  private async run(): Promise<void> {
    const interval = this.options.dataIntervalSeconds;
    log.info(`aggregation loop started, every ${interval}s`);

    while (!this.stopSignal.isSet) {
      const startedAt = this.clock.now();
      try {
        await this.runCycle();
      } catch (err) {
        this.cycleFaults++;
        log.error(`aggregation cycle failed: ${describeError(err)}`, err);
        if (await this.stopSignal.wait(this.errorBackoffSeconds())) break;
      }

      const elapsed = this.clock.now() - startedAt;
      const sleep = Math.max(MIN_SLEEP_SECONDS, interval - elapsed);
      if (await this.stopSignal.wait(sleep)) break;
    }

    log.info('aggregation loop stopped');
  }

  /** One collect → assemble → dispatch pass. */
  async runCycle(): Promise<CycleResult> {
    this.cycles++;
    const gps = await this.readPosition();
    const reading = await this.readDiagnostics();

    const busSignals: Record<string, number> = {};
    const samples = this.queue.drain();
    for (const sample of samples) busSignals[sample.name] = sample.value;
    if (samples.length > 0) log.debug(`folded ${samples.length} bus sample(s) into snapshot`);

    const snapshot = freezeSnapshot({
      timestampUtc: this.nextTimestamp(),
      deviceId: this.options.deviceId,
      sensors: { ...reading.sensors },
      gps,
      dtcs: [...reading.dtcs],
      busSignals,
    });

    if (!hasSnapshotData(snapshot)) {
      this.snapshotsDiscarded++;
      log.debug('no sensor, position, DTC or bus data this cycle');
      return { snapshot: null, dispatch: {} };
    }

    const dispatch = await this.dispatch(snapshot);
    this.lastSnapshot = snapshot;
    this.snapshotsDispatched++;
    return { snapshot, dispatch };
  }

  /** Wall-clock seconds, held back so snapshots never go backwards in time. */
  private nextTimestamp(): number {
    const now = this.wallClock();
    const ts = this.lastTimestamp === null ? now : Math.max(now, this.lastTimestamp);
    this.lastTimestamp = ts;
    return ts;
  }

  private async readPosition(): Promise<PositionFix | null> {
    const source = this.sources.position;
    if (!source) return null;
    if (!source.isConnected()) {
      log.debug('position source not connected');
      return null;
    }
    try {
      const fix = await source.getPosition();
      if (!fix) log.debug('no position fix this cycle');
      return fix ? { ...fix } : null;
    } catch (err) {
      log.warn(`position read failed: ${describeError(err)}`);
      return null;
    }
  }

  private async readDiagnostics(): Promise<DiagnosticReading> {
    const source = this.sources.diagnostics;
    if (!source) return EMPTY_READING;
    if (!source.isConnected()) {
      log.warn('diagnostic source enabled but not connected');
      return EMPTY_READING;
    }
    try {
      return await source.read();
    } catch (err) {
      log.warn(`diagnostic read failed: ${describeError(err)}`);
      return EMPTY_READING;
    }
  }

  private async dispatch(snapshot: Snapshot): Promise<Partial<Record<SinkName, DispatchOutcome>>> {
    const tasks: Array<Promise<[SinkName, DispatchOutcome]>> = [];
    const { mesh, messageBus, tracking } = this.sinks;

    if (mesh) tasks.push(this.guard('mesh', () => this.sendMesh(mesh, snapshot)));
    if (messageBus) tasks.push(this.guard('messageBus', () => this.publish(messageBus, snapshot)));
    if (tracking) tasks.push(this.guard('tracking', () => this.sendTracking(tracking, snapshot)));

    const outcomes = await Promise.all(tasks);
    const result: Partial<Record<SinkName, DispatchOutcome>> = {};
    for (const [name, outcome] of outcomes) {
      result[name] = outcome;
      this.sinkCounters[name][outcome]++;
    }
    return result;
  }

  /** Runs one sink delivery; a throwing sink counts as a failure for that sink only. */
  private async guard(
    name: SinkName,
    deliver: () => Promise<DispatchOutcome>,
  ): Promise<[SinkName, DispatchOutcome]> {
    try {
      return [name, await deliver()];
    } catch (err) {
      log.error(`${name} sink threw: ${describeError(err)}`);
      return [name, 'failed'];
    }
  }

  private async sendMesh(sink: MeshSink, snapshot: Snapshot): Promise<DispatchOutcome> {
    if (!sink.isConnected()) {
      log.debug('mesh sink not connected, skipping');
      return 'skipped';
    }
    if (await sink.send(snapshot)) {
      log.info('snapshot sent via mesh');
      return 'sent';
    }
    log.warn('mesh send failed');
    return 'failed';
  }

  private async publish(sink: MessageBusSink, snapshot: Snapshot): Promise<DispatchOutcome> {
    if (!sink.isConnected()) {
      log.warn('message bus not connected, skipping publish');
      return 'skipped';
    }
    if (await sink.publish(snapshot, this.subTopic)) return 'sent';
    log.warn('message bus publish failed');
    return 'failed';
  }

  private async sendTracking(
    tracking: NonNullable<AggregatorSinks['tracking']>,
    snapshot: Snapshot,
  ): Promise<DispatchOutcome> {
    if (!tracking.sink.isConfigured()) return 'skipped';
    if (!isUsableFix(snapshot.gps)) {
      log.debug('no usable position fix, skipping tracking send');
      return 'skipped';
    }
    if (!tracking.limiter.tryTrigger()) {
      log.debug(`tracking send rate limited, next in ${tracking.limiter.timeToNextTrigger().toFixed(1)}s`);
      return 'skipped';
    }
    if (await tracking.sink.send(snapshot)) return 'sent';
    log.warn('tracking send failed');
    return 'failed';
  }
}
