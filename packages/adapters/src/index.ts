// ─── Logging ──────────────────────────────────────────────────────────────────
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  isLogLevel,
  parseLogLevel,
  describeError,
} from './logging/logger.js';
export type { Logger, LogLevel } from './logging/logger.js';

// ─── Clock ────────────────────────────────────────────────────────────────────
export { systemClock, ManualClock, wallClockSeconds } from './clock/monotonic-clock.js';

// ─── Serialization / Units ────────────────────────────────────────────────────
export { toSnapshotPayload, serializeSnapshot } from './serialization/snapshot-payload.js';
export type { SnapshotPayload, GpsPayload } from './serialization/snapshot-payload.js';
export { kphToKnots, mphToKnots, mpsToKnots, cleanSensorName, roundTo } from './util/units.js';

// ─── Bus Drivers ──────────────────────────────────────────────────────────────
export { VirtualBusHub, defaultVirtualBus } from './bus/virtual-bus.js';
export {
  CandumpReplayConnector,
  parseCandumpLine,
  parseCandumpLog,
} from './bus/candump-replay-bus.js';
export type { CandumpReplayOptions, CandumpEntry, CandumpLog } from './bus/candump-replay-bus.js';

// ─── Collaborators ────────────────────────────────────────────────────────────
export { GpsdPositionSource } from './gpsd/gpsd-position-source.js';
export type { GpsdOptions } from './gpsd/gpsd-position-source.js';
export { MqttSnapshotPublisher, createMqttSnapshotPublisher } from './mqtt/mqtt-snapshot-publisher.js';
export type {
  MqttTransport,
  MqttPublisherOptions,
  MqttConnectConfig,
} from './mqtt/mqtt-snapshot-publisher.js';
export { OsmAndTrackingClient } from './traccar/osmand-tracking-client.js';
export type { OsmAndClientOptions } from './traccar/osmand-tracking-client.js';
export { MeshSnapshotSender, MeshSendTimeoutError, MESH_BROADCAST, MESH_MAX_PAYLOAD_BYTES } from './mesh/mesh-snapshot-sender.js';
export type { MeshTransport, MeshPacketOptions, MeshSenderOptions } from './mesh/mesh-snapshot-sender.js';

// ─── Diagnostics ──────────────────────────────────────────────────────────────
export { ObdDiagnosticSource } from './obd/obd-diagnostic-source.js';
export type { ObdTransport, ObdSourceOptions } from './obd/obd-diagnostic-source.js';
export { Elm327Transport, ObdAdapterError, connectTcp, parseHexLine } from './obd/elm327-transport.js';
export type { Elm327Options, ElmLinkFactory } from './obd/elm327-transport.js';
export { findObdCommand, parseSupportedPids, decodeDtc, decodeDtcs } from './obd/obd-commands.js';
export type { ObdCommand } from './obd/obd-commands.js';
