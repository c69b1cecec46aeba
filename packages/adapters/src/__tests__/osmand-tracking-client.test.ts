import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';
import type { Snapshot } from '@telemetry-relay/domain';
import { OsmAndTrackingClient } from '../index.js';
import type { OsmAndClientOptions } from '../index.js';

const ORIGIN = 'http://traccar.test:5055';

const SNAPSHOT: Snapshot = {
  timestampUtc: 1_700_000_000.75,
  deviceId: 'unit-7',
  sensors: { 'Coolant Temp': 88 },
  gps: { latitude: 52.5, longitude: 13.4, altitude: 34, speed: 10, course: 90, hdop: 1.2 },
  dtcs: ['P0301', 'P0420'],
  busSignals: { EngineSpeed: 75 },
};

let mockAgent: MockAgent;

function makeClient(overrides: Partial<OsmAndClientOptions> = {}): OsmAndTrackingClient {
  return new OsmAndTrackingClient({
    host: 'traccar.test',
    port: 5055,
    httpPath: '/',
    deviceId: 'unit-7',
    requestTimeoutSeconds: 5,
    convertSpeedToKnots: true,
    dispatcher: mockAgent,
    ...overrides,
  });
}

beforeEach(() => {
  mockAgent = new MockAgent();
  mockAgent.disableNetConnect();
});

afterEach(async () => {
  await mockAgent.close();
});

describe('OsmAndTrackingClient.buildParams', () => {
  it('encodes the fix, sensors, bus signals and DTCs in order', () => {
    const params = makeClient().buildParams(SNAPSHOT);
    expect([...params.keys()]).toEqual([
      'id',
      'timestamp',
      'lat',
      'lon',
      'altitude',
      'speed',
      'bearing',
      'hdop',
      'coolant_temp',
      'can_enginespeed',
      'dtcs',
    ]);
    expect(params.get('timestamp')).toBe('1700000000');
    expect(params.get('speed')).toBe('19.44');
    expect(params.get('bearing')).toBe('90');
    expect(params.get('coolant_temp')).toBe('88');
    expect(params.get('can_enginespeed')).toBe('75');
    expect(params.get('dtcs')).toBe('P0301,P0420');
  });

  it('sends speed in m/s when conversion is off', () => {
    const params = makeClient({ convertSpeedToKnots: false }).buildParams(SNAPSHOT);
    expect(params.get('speed')).toBe('10');
  });
});

describe('OsmAndTrackingClient.send', () => {
  it('normalises the path', () => {
    expect(makeClient({ httpPath: 'osmand' }).baseUrl).toBe(`${ORIGIN}/osmand`);
  });

  it('POSTs the query string and reports success', async () => {
    let requested = '';
    mockAgent
      .get(ORIGIN)
      .intercept({
        method: 'POST',
        path: (path: string) => {
          requested = path;
          return path.startsWith('/?');
        },
      })
      .reply(200, 'OK');

    await expect(makeClient().send(SNAPSHOT)).resolves.toBe(true);
    expect(new URLSearchParams(requested.slice(2)).get('id')).toBe('unit-7');
    expect(new URLSearchParams(requested.slice(2)).get('lat')).toBe('52.5');
  });

  it('reports a non-2xx answer as a failure', async () => {
    mockAgent.get(ORIGIN).intercept({ method: 'POST', path: () => true }).reply(400, 'unknown device');
    await expect(makeClient().send(SNAPSHOT)).resolves.toBe(false);
  });

  it('reports a network error as a failure', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ method: 'POST', path: () => true })
      .replyWithError(new Error('connection refused'));
    await expect(makeClient().send(SNAPSHOT)).resolves.toBe(false);
  });

  it('does not send without a usable fix or configuration', async () => {
    await expect(makeClient().send({ ...SNAPSHOT, gps: { latitude: 0, longitude: 0 } })).resolves.toBe(false);

    const unconfigured = makeClient({ deviceId: '' });
    expect(unconfigured.isConfigured()).toBe(false);
    await expect(unconfigured.send(SNAPSHOT)).resolves.toBe(false);
  });

  it('stops sending after close', async () => {
    const client = makeClient();
    await client.close();
    expect(client.isConfigured()).toBe(false);
  });
});
