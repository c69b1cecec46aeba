// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/signal-definition.js';
export * from './entities/raw-frame.js';
export * from './entities/decoded-sample.js';
export * from './entities/position-fix.js';
export * from './entities/snapshot.js';
export * from './entities/bus-state.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/closeable.port.js';
export * from './ports/outbound/bus-connector.port.js';
export * from './ports/outbound/position-source.port.js';
export * from './ports/outbound/diagnostic-source.port.js';
export * from './ports/outbound/snapshot-sinks.port.js';
export * from './ports/outbound/monotonic-clock.port.js';
