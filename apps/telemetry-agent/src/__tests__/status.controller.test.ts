/**
 * Status API Tests
 *
 * Builds the Express app over an in-memory status source and drives it with supertest.
 */

import { describe, it, expect, beforeEach, jest, afterEach } from '@jest/globals';
import request from 'supertest';
import type { Snapshot } from '@telemetry-relay/domain';
import { buildStatusApp } from '../app.js';
import type { AgentStatus, StatusSource } from '../agent.js';
import { SignalCatalog } from '../services/signals/signal-catalog.js';

// ─── Test harness ─────────────────────────────────────────────────────────────

const scalar = { type: 'scalar', start_byte: 0, length_bytes: 1, scale: 1, offset: 0, is_signed: false, byte_order: 'big' };

const CATALOG = SignalCatalog.build([
  { id: '0x123', name: 'EngineSpeed', parser: scalar },
  { id: '0x1A0', name: 'YawRate', parser: scalar },
]);

const STATUS: AgentStatus = {
  deviceId: 'unit-7',
  running: true,
  bus: { state: 'connected', framesReceived: 12, samplesDecoded: 10, samplesDropped: 0 },
  aggregator: {
    cycles: 3,
    snapshotsDispatched: 2,
    snapshotsDiscarded: 1,
    cycleFaults: 0,
    lastSnapshotTs: 1_700_000_000,
    sinks: {
      mesh: { sent: 0, failed: 0, skipped: 0 },
      messageBus: { sent: 2, failed: 0, skipped: 0 },
      tracking: { sent: 1, failed: 0, skipped: 1 },
    },
  },
  catalog: { definitions: 2, frameIds: 2 },
};

const SNAPSHOT: Snapshot = {
  timestampUtc: 1_700_000_000,
  deviceId: 'unit-7',
  sensors: {},
  gps: { latitude: 52.52, longitude: 13.405 },
  dtcs: [],
  busSignals: { EngineSpeed: 75 },
};

let latest: Snapshot | null;
let statusImpl: () => AgentStatus;

const source: StatusSource = {
  catalog: CATALOG,
  status: () => statusImpl(),
  latestSnapshot: () => latest,
};

const app = buildStatusApp(source, { requestLog: null });

beforeEach(() => {
  latest = null;
  statusImpl = () => STATUS;
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════════
// Routes
// ═══════════════════════════════════════════════════════════════════════════════

describe('GET /healthz', () => {
  it('returns status ok', async () => {
    const res = await request(app).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.running).toBe(true);
    expect(res.body.ts).toBeDefined();
  });
});

describe('GET /api/status', () => {
  it('returns the agent status', async () => {
    const res = await request(app).get('/api/status').expect(200);
    expect(res.body).toEqual(STATUS);
  });

  it('maps unexpected errors to 500', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    statusImpl = () => {
      throw new Error('stats unavailable');
    };
    const res = await request(app).get('/api/status').expect(500);
    expect(res.body).toEqual({ error: 'Internal server error' });
  });
});

describe('GET /api/snapshot/latest', () => {
  it('returns 404 before the first snapshot', async () => {
    const res = await request(app).get('/api/snapshot/latest').expect(404);
    expect(res.body).toEqual({ error: 'no snapshot dispatched yet' });
  });

  it('returns the last snapshot in wire form', async () => {
    latest = SNAPSHOT;
    const res = await request(app).get('/api/snapshot/latest').expect(200);
    expect(res.body).toEqual({
      timestamp_utc: 1_700_000_000,
      device_id: 'unit-7',
      sensors: {},
      gps: { latitude: 52.52, longitude: 13.405 },
      dtcs: [],
      bus_signals: { EngineSpeed: 75 },
    });
  });
});

describe('GET /api/catalog', () => {
  it('lists every definition', async () => {
    const res = await request(app).get('/api/catalog').expect(200);
    expect(res.body.total).toBe(2);
    expect(res.body.data[0]).toEqual({
      frameId: '0x123',
      name: 'EngineSpeed',
      startByte: 0,
      lengthBytes: 1,
      scale: 1,
      offset: 0,
      isSigned: false,
      byteOrder: 'big',
    });
  });

  it('filters by frame id', async () => {
    const res = await request(app).get('/api/catalog').query({ frameId: '0x1a0' }).expect(200);
    expect(res.body.total).toBe(1);
    expect(res.body.data[0].name).toBe('YawRate');
  });

  it('returns an empty list for an unknown frame id', async () => {
    const res = await request(app).get('/api/catalog?frameId=0x7FF').expect(200);
    expect(res.body).toEqual({ data: [], total: 0 });
  });

  it('returns 400 for an invalid frame id', async () => {
    const res = await request(app).get('/api/catalog?frameId=xyz').expect(400);
    expect(res.body.error).toBe('validation_error');
    expect(res.body.details[0].message).toBe("invalid frame id 'xyz'");
  });
});
