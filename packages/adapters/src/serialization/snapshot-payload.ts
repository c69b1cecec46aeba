import type { PositionFix, SensorValue, Snapshot } from '@telemetry-relay/domain';

export interface GpsPayload {
  latitude: number;
  longitude: number;
  altitude?: number;
  speed?: number;
  course?: number;
  satellites?: number;
  hdop?: number;
  fix_time?: number;
}

/** Wire form shared by MQTT and the status API. Keys are snake_case. */
export interface SnapshotPayload {
  timestamp_utc: number;
  device_id: string;
  sensors: Record<string, SensorValue>;
  gps: GpsPayload | Record<string, never>;
  dtcs: string[];
  bus_signals: Record<string, number>;
}

function toGpsPayload(fix: PositionFix): GpsPayload {
  const gps: GpsPayload = { latitude: fix.latitude, longitude: fix.longitude };
  if (fix.altitude !== undefined) gps.altitude = fix.altitude;
  if (fix.speed !== undefined) gps.speed = fix.speed;
  if (fix.course !== undefined) gps.course = fix.course;
  if (fix.satellites !== undefined) gps.satellites = fix.satellites;
  if (fix.hdop !== undefined) gps.hdop = fix.hdop;
  if (fix.fixTime !== undefined) gps.fix_time = fix.fixTime;
  return gps;
}

export function toSnapshotPayload(snapshot: Snapshot): SnapshotPayload {
  return {
    timestamp_utc: snapshot.timestampUtc,
    device_id: snapshot.deviceId,
    sensors: { ...snapshot.sensors },
    gps: snapshot.gps ? toGpsPayload(snapshot.gps) : {},
    dtcs: [...snapshot.dtcs],
    bus_signals: { ...snapshot.busSignals },
  };
}

export function serializeSnapshot(snapshot: Snapshot): string {
  return JSON.stringify(toSnapshotPayload(snapshot));
}
