import type { PositionFix } from './position-fix.js';

export type SensorValue = number | string | boolean;

/** One aggregation cycle's view of the vehicle. Frozen before it reaches a sink. */
export interface Snapshot {
  /** epoch seconds */
  readonly timestampUtc: number;
  readonly deviceId: string;
  readonly sensors: Readonly<Record<string, SensorValue>>;
  readonly gps: PositionFix | null;
  readonly dtcs: readonly string[];
  readonly busSignals: Readonly<Record<string, number>>;
}

export function hasSnapshotData(snapshot: Snapshot): boolean {
  return (
    Object.keys(snapshot.sensors).length > 0 ||
    snapshot.gps !== null ||
    snapshot.dtcs.length > 0 ||
    Object.keys(snapshot.busSignals).length > 0
  );
}
