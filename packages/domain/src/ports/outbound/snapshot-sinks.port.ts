import type { Snapshot } from '../../entities/snapshot.js';
import type { Closeable } from './closeable.port.js';

export interface MeshSink extends Closeable {
  isConnected(): boolean;
  /** Oversize payloads resolve `false` without transmitting anything. */
  send(snapshot: Snapshot): Promise<boolean>;
}

export interface MessageBusSink extends Closeable {
  isConnected(): boolean;
  publish(snapshot: Snapshot, subTopic: string): Promise<boolean>;
}

export interface TrackingSink extends Closeable {
  isConfigured(): boolean;
  /** Callers must only send snapshots that carry a usable fix. */
  send(snapshot: Snapshot): Promise<boolean>;
}
