import type { DataChannel } from '../../types/market-data.types.js';
import type { PusherCommand, PusherConnection } from '../../types/subscription.types.js';
import { getLogger } from '../../utils/logger.js';
import { InstrumentChannel } from './instrument-channel.js';

const NO_SUBSCRIBERS: ReadonlySet<PusherConnection> = new Set();

/**
 * Channel records keyed by ISIN. Records are created on first subscribe and
 * kept for the session; the instrument universe is fixed per trading day.
 */
export class SubscriptionRegistry {
  private channels = new Map<string, InstrumentChannel>();
  private logger = getLogger();

  apply(connection: PusherConnection, command: PusherCommand): void {
    for (const isin of command.isins) {
      let channel = this.channels.get(isin);
      if (!channel) {
        if (command.action === 'unsubscribe') {
          continue;
        }
        channel = new InstrumentChannel(isin);
        this.channels.set(isin, channel);
        this.logger.info({ isin }, 'New channel');
      }
      channel.apply(command.action, command.channel, connection);
    }
  }

  subscribersOf(isin: string, channel: DataChannel): ReadonlySet<PusherConnection> {
    return this.channels.get(isin)?.subscribersOf(channel) ?? NO_SUBSCRIBERS;
  }

  hasSubscriptions(connection: PusherConnection): boolean {
    for (const channel of this.channels.values()) {
      if (channel.has(connection)) {
        return true;
      }
    }
    return false;
  }

  removeEverywhere(connection: PusherConnection): void {
    for (const channel of this.channels.values()) {
      channel.removeConnection(connection);
    }
  }

  channelCount(): number {
    return this.channels.size;
  }
}
