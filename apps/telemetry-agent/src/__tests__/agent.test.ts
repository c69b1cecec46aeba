import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { setTimeout as delay } from 'node:timers/promises';
import { MockAgent } from 'undici';
import type { MessageBusSink, PositionFix, PositionSource, Snapshot } from '@telemetry-relay/domain';
import { VirtualBusHub } from '@telemetry-relay/adapters';
import type { MeshPacketOptions, MeshTransport, ObdTransport } from '@telemetry-relay/adapters';
import { buildAgent } from '../agent.js';
import { DEFAULT_CONFIG } from '../config/agent-config.js';
import type { AgentConfig } from '../config/agent-config.js';

// ─── Fakes ────────────────────────────────────────────────────────────────────

class RecordingBus implements MessageBusSink {
  readonly published: Snapshot[] = [];
  closed = false;

  isConnected(): boolean {
    return !this.closed;
  }

  async publish(snapshot: Snapshot): Promise<boolean> {
    this.published.push(snapshot);
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class StaticPosition implements PositionSource {
  closed = false;

  constructor(private readonly fix: PositionFix) {}

  isConnected(): boolean {
    return true;
  }

  async getPosition(): Promise<PositionFix | null> {
    return this.fix;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

class RecordingRadio implements MeshTransport {
  readonly nodeId = '!a1b2c3d4';
  readonly packets: Array<{ payload: unknown; options: MeshPacketOptions }> = [];
  connected = true;

  async sendData(data: Uint8Array, options: MeshPacketOptions): Promise<void> {
    const payload: unknown = JSON.parse(Buffer.from(data).toString('utf-8'));
    this.packets.push({ payload, options });
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}

/** Vehicle that supports RPM only and has one stored code. */
class IdlingVehicle implements ObdTransport {
  readonly description = 'bench vehicle';
  closed = false;

  async open(): Promise<void> {}

  async query(pid: number): Promise<number[] | null> {
    if (pid === 0x00) return [0x00, 0x10, 0x00, 0x00];
    if (pid === 0x0c) return [0x0c, 0xd0];
    return null;
  }

  async readDtcs(): Promise<string[]> {
    return ['P0301'];
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ─── Harness ──────────────────────────────────────────────────────────────────

function benchConfig(): AgentConfig {
  return {
    ...DEFAULT_CONFIG,
    general: { ...DEFAULT_CONFIG.general, deviceId: 'unit-7', dataIntervalSeconds: 0.05 },
    can: {
      ...DEFAULT_CONFIG.can,
      enabled: true,
      channel: 'bench0',
      receiveTimeoutSeconds: 0.05,
      messageDefinitions: [
        {
          id: '0x123',
          name: 'EngineSpeed',
          parser: {
            type: 'scalar',
            start_byte: 0,
            length_bytes: 2,
            scale: 0.25,
            offset: 0,
            is_signed: false,
            byte_order: 'big',
          },
        },
      ],
    },
    traccar: { ...DEFAULT_CONFIG.traccar, enabled: true, host: 'traccar.test', reportIntervalSeconds: 30 },
  };
}

async function waitFor(condition: () => boolean, timeoutMs = 3_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await delay(5);
  }
}

let mockAgent: MockAgent;

beforeEach(() => {
  mockAgent = new MockAgent();
  mockAgent.disableNetConnect();
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  await mockAgent.close();
  jest.restoreAllMocks();
});

describe('buildAgent', () => {
  it('relays decoded bus signals and position to the message bus and tracker', async () => {
    mockAgent.get('http://traccar.test:5055').intercept({ method: 'POST', path: () => true }).reply(200, 'OK');
    const hub = new VirtualBusHub();
    const bus = new RecordingBus();
    const position = new StaticPosition({ latitude: 52.52, longitude: 13.405, speed: 5 });
    const agent = buildAgent(benchConfig(), {
      virtualBus: hub,
      position,
      messageBus: bus,
      dispatcher: mockAgent,
    });

    await agent.start();
    expect(agent.busListener?.isConnected()).toBe(true);

    hub.send('bench0', { arbitrationId: 0x123, payload: Uint8Array.of(0x01, 0x2c), timestamp: 1 });
    await waitFor(() => bus.published.some((s) => s.busSignals['EngineSpeed'] === 75));
    await waitFor(() => agent.status().aggregator.sinks.tracking.sent === 1);

    const status = agent.status();
    expect(status.deviceId).toBe('unit-7');
    expect(status.running).toBe(true);
    expect(status.bus?.framesReceived).toBe(1);
    expect(status.catalog).toEqual({ definitions: 1, frameIds: 1 });
    expect(agent.latestSnapshot()?.gps).toEqual({ latitude: 52.52, longitude: 13.405, speed: 5 });

    await agent.stop();
    expect(agent.status().running).toBe(false);
    expect(bus.closed).toBe(true);
    expect(position.closed).toBe(true);
    expect(hub.connectionCount('bench0')).toBe(0);
  });

  it('builds no bus listener when the bus is disabled', () => {
    const agent = buildAgent({ ...DEFAULT_CONFIG, general: { ...DEFAULT_CONFIG.general, deviceId: 'unit-7' } });
    expect(agent.busListener).toBeNull();
    expect(agent.status().bus).toBeNull();
    expect(agent.catalog.size).toBe(0);
  });

  it('relays OBD readings over the mesh radio under its node id', async () => {
    const radio = new RecordingRadio();
    const vehicle = new IdlingVehicle();
    const agent = buildAgent(
      {
        ...DEFAULT_CONFIG,
        general: { ...DEFAULT_CONFIG.general, deviceIdSource: 'mesh_node_id', dataIntervalSeconds: 0.05 },
        obd: { ...DEFAULT_CONFIG.obd, enabled: true, commands: ['RPM'], connectionRetries: 0 },
        mesh: { ...DEFAULT_CONFIG.mesh, enabled: true, portNum: 251 },
      },
      { meshTransport: radio, obdTransport: vehicle },
    );
    expect(agent.deviceId).toBe('!a1b2c3d4');

    await agent.start();
    const carriesRpm = (p: { payload: unknown }) => JSON.stringify(p.payload).includes('"sensors":{"rpm":820}');
    await waitFor(() => radio.packets.some(carriesRpm));
    await agent.stop();

    const packet = radio.packets.find(carriesRpm);
    expect(packet?.payload).toMatchObject({ device_id: '!a1b2c3d4', sensors: { rpm: 820 }, dtcs: ['P0301'] });
    expect(packet?.options).toEqual({ destination: '^all', portNum: 251, channelIndex: 0, wantAck: false });
    expect(radio.connected).toBe(false);
    expect(vehicle.closed).toBe(true);
  });

  it('leaves mesh output off without a radio transport', () => {
    const agent = buildAgent({
      ...DEFAULT_CONFIG,
      general: { ...DEFAULT_CONFIG.general, deviceId: 'unit-7' },
      mesh: { ...DEFAULT_CONFIG.mesh, enabled: true },
    });
    expect(agent.deviceId).toBe('unit-7');
    expect(console.warn).toHaveBeenCalledWith('[agent] mesh output enabled but no radio transport is available');
  });
});
