import { describe, it, expect, beforeEach } from '@jest/globals';
import { GpsdPositionSource, ManualClock } from '../index.js';

const TPV_3D = JSON.stringify({
  class: 'TPV',
  mode: 3,
  time: '2024-05-01T12:00:00.000Z',
  lat: 52.52,
  lon: 13.405,
  alt: 34.5,
  altHAE: 80.2,
  speed: 12.5,
  track: 271.3,
});

let clock: ManualClock;
let gps: GpsdPositionSource;

beforeEach(() => {
  clock = new ManualClock(100);
  gps = new GpsdPositionSource({ maxFixAgeSeconds: 10, clock });
});

describe('GpsdPositionSource', () => {
  it('has no position before any report', async () => {
    expect(gps.isConnected()).toBe(false);
    await expect(gps.getPosition()).resolves.toBeNull();
  });

  it('turns a TPV report into a fix', async () => {
    gps.handleMessage(TPV_3D);
    await expect(gps.getPosition()).resolves.toEqual({
      latitude: 52.52,
      longitude: 13.405,
      altitude: 80.2,
      speed: 12.5,
      course: 271.3,
      fixTime: 1_714_564_800,
    });
  });

  it('falls back to alt when altHAE is missing', async () => {
    gps.handleMessage(JSON.stringify({ class: 'TPV', mode: 3, lat: 1.5, lon: 2.5, alt: 12 }));
    await expect(gps.getPosition()).resolves.toEqual({ latitude: 1.5, longitude: 2.5, altitude: 12 });
  });

  it('ignores reports without a 2D fix', async () => {
    gps.handleMessage(JSON.stringify({ class: 'TPV', mode: 1, lat: 1, lon: 2 }));
    gps.handleMessage(JSON.stringify({ class: 'TPV', mode: 3 }));
    await expect(gps.getPosition()).resolves.toBeNull();
  });

  it('merges satellites and HDOP from SKY reports', async () => {
    gps.handleMessage(TPV_3D);
    gps.handleMessage(JSON.stringify({ class: 'SKY', hdop: 0.9, uSat: 7 }));
    await expect(gps.getPosition()).resolves.toMatchObject({ satellites: 7, hdop: 0.9 });
  });

  it('counts used satellites when uSat is absent', async () => {
    gps.handleMessage(TPV_3D);
    gps.handleMessage(
      JSON.stringify({ class: 'SKY', satellites: [{ used: true }, { used: false }, { used: true }, {}] }),
    );
    await expect(gps.getPosition()).resolves.toMatchObject({ satellites: 2 });
  });

  it('treats a stale fix as no fix', async () => {
    gps.handleMessage(TPV_3D);
    clock.advance(10);
    await expect(gps.getPosition()).resolves.not.toBeNull();
    clock.advance(0.5);
    await expect(gps.getPosition()).resolves.toBeNull();
  });

  it('ignores lines that are not JSON or not position reports', async () => {
    gps.handleMessage('garbage');
    gps.handleMessage(JSON.stringify({ class: 'VERSION', release: '3.25' }));
    await expect(gps.getPosition()).resolves.toBeNull();
  });

  it('closes cleanly without ever connecting', async () => {
    await expect(gps.close()).resolves.toBeUndefined();
  });
});
