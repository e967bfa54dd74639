import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import WebSocket, { WebSocketServer } from 'ws';
import type {
  ChangeNotification,
  ChangeSink,
  ChannelPayload,
  Instrument,
  PushEnvelope,
} from '../types/market-data.types.js';
import type {
  ConnectionState,
  PusherCommand,
  PusherConnection,
} from '../types/subscription.types.js';
import type { MarketRealtimeRepository } from '../services/market-data/market-realtime.repository.js';
import {
  clientTypePayload,
  initialPayload,
  orderBookPayload,
  thresholdsPayload,
  tradePayload,
} from '../services/market-data/instrument.serializer.js';
import { broadcast } from '../services/subscriptions/broadcaster.js';
import { parseCommand } from '../services/subscriptions/command-parser.js';
import { SubscriptionRegistry } from '../services/subscriptions/subscription-registry.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

type GatewayOptions = {
  path: string;
  sendTimeoutMs: number;
};

export class WebSocketConnection implements PusherConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
  ) {}

  send(message: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error(`Connection ${this.id} is not open`));
        return;
      }
      this.socket.send(message, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

/**
 * Downstream subscription broker. Accepts subscribe/unsubscribe commands,
 * answers subscribes with the current snapshot and relays repository
 * change notifications to the matching subscribers.
 */
export class MarketPusherGateway implements ChangeSink {
  private wss: WebSocketServer;
  private registry = new SubscriptionRegistry();
  private states = new Map<PusherConnection, ConnectionState>();
  private logger = getLogger();

  constructor(
    app: FastifyInstance,
    private readonly repository: MarketRealtimeRepository,
    private readonly options: GatewayOptions,
  ) {
    this.wss = new WebSocketServer({
      server: app.server,
      path: options.path,
    });

    this.wss.on('connection', (socket) => this.handleSocket(socket));
    this.repository.registerChangeSink(this);
  }

  close(): void {
    for (const socket of this.wss.clients) {
      socket.terminate();
    }
    this.wss.close();
  }

  connectionCount(): number {
    return this.states.size;
  }

  channelCount(): number {
    return this.registry.channelCount();
  }

  connectionState(connection: PusherConnection): ConnectionState {
    return this.states.get(connection) ?? 'closed';
  }

  openConnection(connection: PusherConnection): void {
    this.states.set(connection, 'open');
    this.logger.info({ connection: connection.id }, 'Connection opened');
  }

  closeConnection(connection: PusherConnection): void {
    if (!this.states.has(connection)) {
      return;
    }
    this.registry.removeEverywhere(connection);
    this.states.delete(connection);
    this.logger.info({ connection: connection.id }, 'Connection closed');
  }

  /**
   * Applies one command for `connection`. Returns the initial snapshot
   * envelope for a subscribe that names at least one known instrument,
   * otherwise `null`. Malformed commands are logged and ignored.
   */
  handleCommand(connection: PusherConnection, message: string): PushEnvelope | null {
    if (this.connectionState(connection) === 'closed') {
      this.logger.debug({ connection: connection.id }, 'Command on closed connection ignored');
      return null;
    }

    let command: PusherCommand;
    try {
      command = parseCommand(message);
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        throw error;
      }
      this.logger.error({ connection: connection.id, message }, error.message);
      return null;
    }

    this.registry.apply(connection, command);
    this.states.set(connection, this.registry.hasSubscriptions(connection) ? 'active' : 'open');

    if (command.action === 'unsubscribe') {
      return null;
    }

    const envelope: PushEnvelope = {};
    const instruments = this.repository.snapshots(command.isins);
    command.isins.forEach((isin, index) => {
      const instrument = instruments[index];
      if (instrument) {
        envelope[isin] = initialPayload(command.channel, instrument);
      }
    });
    return Object.keys(envelope).length > 0 ? envelope : null;
  }

  async onChange(notification: ChangeNotification): Promise<void> {
    const subscribers = this.registry.subscribersOf(notification.isin, notification.channel);
    if (subscribers.size === 0) {
      return;
    }

    const instrument = this.repository.snapshot(notification.isin);
    if (!instrument) {
      return;
    }

    const message = JSON.stringify({
      [notification.isin]: this.changePayload(notification, instrument),
    });
    const result = await broadcast(subscribers, message, this.options.sendTimeoutMs);
    this.logger.debug(
      { isin: notification.isin, channel: notification.channel, ...result },
      'Change pushed',
    );
  }

  private changePayload(notification: ChangeNotification, instrument: Instrument): ChannelPayload {
    switch (notification.channel) {
      case 'trade':
        return tradePayload(instrument);
      case 'thresholds':
        return thresholdsPayload(instrument);
      case 'clienttype':
        return clientTypePayload(instrument);
      case 'orderbook':
        return orderBookPayload(instrument, notification.ranks);
    }
  }

  private handleSocket(socket: WebSocket): void {
    const connection = new WebSocketConnection(randomUUID(), socket);
    this.openConnection(connection);

    socket.on('message', (data) => {
      const message = data.toString();
      this.logger.info({ connection: connection.id, message }, 'Received message');
      const response = this.handleCommand(connection, message);
      if (response) {
        connection.send(JSON.stringify(response)).catch((error: unknown) => {
          this.logger.warn({ err: error, connection: connection.id }, 'Failed to send snapshot');
        });
      }
    });
    socket.on('close', () => this.closeConnection(connection));
    socket.on('error', (error) => {
      this.logger.warn({ err: error, connection: connection.id }, 'Connection error');
      this.closeConnection(connection);
    });
  }
}
