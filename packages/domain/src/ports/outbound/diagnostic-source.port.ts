import type { SensorValue } from '../../entities/snapshot.js';
import type { Closeable } from './closeable.port.js';

export interface DiagnosticReading {
  readonly sensors: Record<string, SensorValue>;
  readonly dtcs: string[];
}

export interface DiagnosticSource extends Closeable {
  isConnected(): boolean;
  /** Items that fail individually are left out rather than failing the read. */
  read(): Promise<DiagnosticReading>;
}
