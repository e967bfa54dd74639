import type { DataChannel } from '../../types/market-data.types.js';
import type {
  PusherAction,
  PusherChannel,
  PusherConnection,
} from '../../types/subscription.types.js';

type SubscribableChannel = Exclude<PusherChannel, 'all'>;

const ALL_CHANNELS: readonly SubscribableChannel[] = ['trade', 'orderbook', 'clienttype'];

/** Subscriber sets of one instrument, one per channel. */
export class InstrumentChannel {
  private subscribers: Record<SubscribableChannel, Set<PusherConnection>> = {
    trade: new Set(),
    orderbook: new Set(),
    clienttype: new Set(),
  };

  constructor(readonly isin: string) {}

  apply(action: PusherAction, channel: PusherChannel, connection: PusherConnection): void {
    const targets = channel === 'all' ? ALL_CHANNELS : [channel];
    for (const target of targets) {
      switch (action) {
        case 'subscribe':
          this.subscribers[target].add(connection);
          break;
        case 'unsubscribe':
          this.subscribers[target].delete(connection);
          break;
      }
    }
  }

  removeConnection(connection: PusherConnection): void {
    this.apply('unsubscribe', 'all', connection);
  }

  has(connection: PusherConnection): boolean {
    return ALL_CHANNELS.some((channel) => this.subscribers[channel].has(connection));
  }

  /** Threshold changes go to the trade subscribers. */
  subscribersOf(channel: DataChannel): ReadonlySet<PusherConnection> {
    switch (channel) {
      case 'trade':
      case 'thresholds':
        return this.subscribers.trade;
      case 'orderbook':
        return this.subscribers.orderbook;
      case 'clienttype':
        return this.subscribers.clienttype;
    }
  }
}
