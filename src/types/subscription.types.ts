import type { PUSHER_CHANNELS } from '../config/constants.js';

export type PusherAction = 'subscribe' | 'unsubscribe';

export type PusherChannel = (typeof PUSHER_CHANNELS)[number];

export interface PusherCommand {
  action: PusherAction;
  channel: PusherChannel;
  isins: string[];
}

export type ConnectionState = 'open' | 'active' | 'closed';

/**
 * A downstream subscriber. `send` resolves once the frame has been handed to
 * the transport and rejects if the transport reports a failure.
 */
export interface PusherConnection {
  readonly id: string;
  send(message: string): Promise<void>;
}

export interface BroadcastResult {
  delivered: number;
  failed: number;
}
