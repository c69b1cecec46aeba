import type {
  BusConnector,
  BusListenerStats,
  DiagnosticSource,
  MeshSink,
  MessageBusSink,
  MonotonicClock,
  PositionSource,
  Snapshot,
} from '@telemetry-relay/domain';
import {
  CandumpReplayConnector,
  Elm327Transport,
  GpsdPositionSource,
  MeshSnapshotSender,
  ObdDiagnosticSource,
  OsmAndTrackingClient,
  createLogger,
  describeError,
  createMqttSnapshotPublisher,
  defaultVirtualBus,
  systemClock,
} from '@telemetry-relay/adapters';
import type { Dispatcher } from 'undici';
import type { MeshTransport, ObdTransport, VirtualBusHub } from '@telemetry-relay/adapters';
import type { AgentConfig, CanConfig, MeshConfig, MqttConfig, ObdConfig } from './config/agent-config.js';
import { resolveDeviceId } from './config/agent-config.js';
import { SignalCatalog } from './services/signals/signal-catalog.js';
import { SampleQueue } from './services/bus/sample-queue.js';
import { BusListener } from './services/bus/bus-listener.js';
import { RateLimiter } from './services/rate-limit/rate-limiter.js';
import { Aggregator } from './services/aggregation/aggregator.js';
import type { AggregatorSinks, AggregatorSources, AggregatorStats } from './services/aggregation/aggregator.js';
import { Supervisor } from './services/supervisor/supervisor.js';
import { StopSignal } from './services/shared/stop-signal.js';

const log = createLogger('agent');

export interface AgentStatus {
  deviceId: string;
  running: boolean;
  bus: BusListenerStats | null;
  aggregator: AggregatorStats;
  catalog: { definitions: number; frameIds: number };
}

/** Read-only view the status HTTP surface is built on. */
export interface StatusSource {
  readonly catalog: SignalCatalog;
  status(): AgentStatus;
  latestSnapshot(): Snapshot | null;
}

/** Overrides for collaborators; anything left out is built from config. */
export interface AgentOverrides {
  virtualBus?: VirtualBusHub;
  busConnector?: BusConnector;
  position?: PositionSource;
  diagnostics?: DiagnosticSource;
  mesh?: MeshSink;
  /** Radio link for the mesh sender; mesh output stays off without one */
  meshTransport?: MeshTransport;
  /** Adapter link for the OBD source; ELM327 over TCP by default */
  obdTransport?: ObdTransport;
  messageBus?: MessageBusSink;
  clock?: MonotonicClock;
  wallClock?: () => number;
  /** undici dispatcher for the tracking client */
  dispatcher?: Dispatcher;
}

export interface Agent extends StatusSource {
  readonly deviceId: string;
  readonly busListener: BusListener | null;
  readonly aggregator: Aggregator;
  readonly supervisor: Supervisor;
  start(): Promise<void>;
  stop(): Promise<void>;
}

function busConnectorFor(can: CanConfig, hub: VirtualBusHub, clock: MonotonicClock): BusConnector {
  if (can.interface === 'candump' && can.logFile) {
    return new CandumpReplayConnector({
      path: can.logFile,
      iface: can.channel,
      speed: can.replaySpeed,
      loop: can.loop,
      clock,
    });
  }
  return hub.connector(can.channel);
}

function meshSenderFor(mesh: MeshConfig, transport: MeshTransport): MeshSnapshotSender {
  return new MeshSnapshotSender(transport, {
    destination: mesh.destination,
    portNum: mesh.portNum,
    channelIndex: mesh.channelIndex,
    maxPayloadBytes: mesh.maxPayloadBytes,
    sendRetries: mesh.sendRetries,
    sendRetryDelaySeconds: mesh.sendRetryDelaySeconds,
  });
}

function obdSourceFor(obd: ObdConfig, transport: ObdTransport | undefined): ObdDiagnosticSource {
  const adapter =
    transport ??
    new Elm327Transport({ host: obd.host, port: obd.port, commandTimeoutSeconds: obd.commandTimeoutSeconds });
  return new ObdDiagnosticSource(adapter, {
    commands: obd.commands,
    includeDtcCodes: obd.includeDtcCodes,
    connectionRetries: obd.connectionRetries,
    retryDelaySeconds: obd.retryDelaySeconds,
  });
}

function mqttPublisherFor(mqtt: MqttConfig, deviceId: string) {
  const { enabled: _enabled, ...connectConfig } = mqtt;
  return createMqttSnapshotPublisher(connectConfig, deviceId);
}

/** Wires every component from configuration. Nothing connects until `start()`. */
export function buildAgent(config: AgentConfig, overrides: AgentOverrides = {}): Agent {
  const deviceId = resolveDeviceId(config.general, { meshNodeId: overrides.meshTransport?.nodeId ?? null });
  const clock = overrides.clock ?? systemClock;
  const stopSignal = new StopSignal();
  const queue = new SampleQueue(config.general.queueSize);

  let catalog = SignalCatalog.empty();
  let busListener: BusListener | null = null;
  if (config.can.enabled) {
    catalog = SignalCatalog.build(config.can.messageDefinitions);
    const connector =
      overrides.busConnector ?? busConnectorFor(config.can, overrides.virtualBus ?? defaultVirtualBus, clock);
    busListener = new BusListener(connector, catalog, queue, stopSignal, {
      connectionRetries: config.can.connectionRetries,
      retryDelaySeconds: config.can.retryDelaySeconds,
      receiveTimeoutSeconds: config.can.receiveTimeoutSeconds,
    });
  }

  let gpsd: GpsdPositionSource | null = null;
  const sources: AggregatorSources = {};
  if (overrides.position) {
    sources.position = overrides.position;
  } else if (config.gps.enabled) {
    gpsd = new GpsdPositionSource({
      host: config.gps.host,
      port: config.gps.port,
      maxFixAgeSeconds: config.gps.maxFixAgeSeconds,
      reconnectDelaySeconds: config.gps.reconnectDelaySeconds,
      clock,
    });
    sources.position = gpsd;
  }
  let obd: ObdDiagnosticSource | null = null;
  if (overrides.diagnostics) {
    sources.diagnostics = overrides.diagnostics;
  } else if (config.obd.enabled) {
    obd = obdSourceFor(config.obd, overrides.obdTransport);
    sources.diagnostics = obd;
  }

  const sinks: AggregatorSinks = {};
  if (overrides.mesh) {
    sinks.mesh = overrides.mesh;
  } else if (config.mesh.enabled) {
    if (overrides.meshTransport) {
      sinks.mesh = meshSenderFor(config.mesh, overrides.meshTransport);
    } else {
      log.warn('mesh output enabled but no radio transport is available');
    }
  }
  if (overrides.messageBus) {
    sinks.messageBus = overrides.messageBus;
  } else if (config.mqtt.enabled) {
    sinks.messageBus = mqttPublisherFor(config.mqtt, deviceId);
  }
  let tracker: OsmAndTrackingClient | null = null;
  if (config.traccar.enabled) {
    tracker = new OsmAndTrackingClient({
      host: config.traccar.host,
      port: config.traccar.port,
      httpPath: config.traccar.httpPath,
      deviceId: config.traccar.deviceId ?? deviceId,
      requestTimeoutSeconds: config.traccar.requestTimeoutSeconds,
      convertSpeedToKnots: config.traccar.convertSpeedToKnots,
      ...(overrides.dispatcher ? { dispatcher: overrides.dispatcher } : {}),
    });
    sinks.tracking = { sink: tracker, limiter: new RateLimiter(config.traccar.reportIntervalSeconds, clock) };
  }

  const aggregator = new Aggregator(queue, stopSignal, sources, sinks, {
    deviceId,
    dataIntervalSeconds: config.general.dataIntervalSeconds,
    clock,
    ...(overrides.wallClock ? { wallClock: overrides.wallClock } : {}),
  });
  const supervisor = new Supervisor(stopSignal, aggregator, busListener, {
    dataIntervalSeconds: config.general.dataIntervalSeconds,
  });

  if (busListener) supervisor.register('bus listener', busListener);
  if (sources.position) supervisor.register('position source', sources.position);
  if (sources.diagnostics) supervisor.register('diagnostic source', sources.diagnostics);
  if (sinks.mesh) supervisor.register('mesh sink', sinks.mesh);
  if (sinks.messageBus) supervisor.register('message bus', sinks.messageBus);
  if (tracker) supervisor.register('tracking client', tracker);

  log.info(
    `device '${deviceId}': bus ${busListener ? 'on' : 'off'}, position ${sources.position ? 'on' : 'off'}, ` +
      `obd ${sources.diagnostics ? 'on' : 'off'}, mesh ${sinks.mesh ? 'on' : 'off'}, ` +
      `mqtt ${sinks.messageBus ? 'on' : 'off'}, tracking ${tracker ? 'on' : 'off'}`,
  );

  return {
    deviceId,
    catalog,
    busListener,
    aggregator,
    supervisor,
    async start() {
      gpsd?.connect();
      if (obd) {
        void obd.connect().catch((err: unknown) => log.error(`OBD connect failed: ${describeError(err)}`));
      }
      await supervisor.start();
    },
    stop: () => supervisor.stop(),
    latestSnapshot: () => aggregator.latestSnapshot(),
    status: () => ({
      deviceId,
      running: supervisor.isRunning(),
      bus: busListener ? busListener.stats() : null,
      aggregator: aggregator.stats(),
      catalog: { definitions: catalog.size, frameIds: catalog.frameIds().length },
    }),
  };
}
