import { BusError } from '@telemetry-relay/domain';
import type { BusConnection, BusConnector, RawFrame } from '@telemetry-relay/domain';

/** Frames buffered per connection before the oldest is discarded. */
const MAX_PENDING_FRAMES = 1_000;

class VirtualBusConnection implements BusConnection {
  private readonly pending: RawFrame[] = [];
  private waiter: ((frame: RawFrame | null) => void) | null = null;
  private closed = false;

  constructor(
    readonly channelInfo: string,
    private readonly detach: (conn: VirtualBusConnection) => void,
  ) {}

  deliver(frame: RawFrame): void {
    if (this.closed) return;
    if (this.waiter) {
      this.waiter(frame);
      return;
    }
    this.pending.push(frame);
    if (this.pending.length > MAX_PENDING_FRAMES) this.pending.shift();
  }

  async receive(timeoutMs: number): Promise<RawFrame | null> {
    if (this.closed) throw new BusError(`${this.channelInfo} is shut down`);
    const next = this.pending.shift();
    if (next) return next;
    if (this.waiter) throw new BusError(`${this.channelInfo} already has a pending receive`);

    return new Promise<RawFrame | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);
      this.waiter = (frame) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(frame);
      };
    });
  }

  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.detach(this);
    this.pending.length = 0;
    this.waiter?.(null);
  }
}

/**
 * In-process bus: every frame sent on a channel reaches each open connection
 * on that channel. Stands in for real hardware on the bench and in tests.
 */
export class VirtualBusHub {
  private readonly channels = new Map<string, Set<VirtualBusConnection>>();

  connector(channel: string): BusConnector {
    return {
      description: `virtual:${channel}`,
      open: async () => {
        const members = this.channels.get(channel) ?? new Set<VirtualBusConnection>();
        this.channels.set(channel, members);
        const conn = new VirtualBusConnection(`virtual channel ${channel}`, (c) => {
          members.delete(c);
        });
        members.add(conn);
        return conn;
      },
    };
  }

  /** Returns how many open connections received the frame. */
  send(channel: string, frame: RawFrame): number {
    const members = this.channels.get(channel);
    if (!members) return 0;
    for (const conn of members) conn.deliver(frame);
    return members.size;
  }

  connectionCount(channel: string): number {
    return this.channels.get(channel)?.size ?? 0;
  }
}

export const defaultVirtualBus = new VirtualBusHub();
