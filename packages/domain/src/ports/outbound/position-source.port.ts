import type { PositionFix } from '../../entities/position-fix.js';
import type { Closeable } from './closeable.port.js';

export interface PositionSource extends Closeable {
  isConnected(): boolean;
  /** `null` when there is no fix or the last one is stale. */
  getPosition(): Promise<PositionFix | null>;
}
