import WebSocket from 'ws';
import { UPSTREAM_SUBSCRIBE_ALL } from '../../config/constants.js';
import { getLogger } from '../../utils/logger.js';
import {
  AppError,
  DecodeError,
  NotImplementedError,
  UpstreamConnectionError,
} from '../../utils/errors.js';
import type { MarketRealtimeRepository } from './market-realtime.repository.js';
import {
  type UpstreamFrame,
  decodeFrame,
  decodeThresholds,
  decodeTrade,
} from './upstream-frame.decoder.js';

type ClientOptions = {
  heartbeatIntervalMs: number;
};

/**
 * Single connection to the upstream push feed. Decoded updates are applied
 * through the repository by ISIN; the client keeps no instrument state.
 */
export class UpstreamPusherClient {
  private ws: WebSocket | null = null;
  private closed: Promise<void> | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private subscribedIsins: ReadonlySet<string> = new Set();
  private logger = getLogger();

  constructor(
    private readonly repository: MarketRealtimeRepository,
    private readonly options: ClientOptions,
  ) {}

  isOpen(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  connect(host: string, port: number): Promise<void> {
    if (this.ws) {
      return Promise.reject(
        new UpstreamConnectionError(`ws://${host}:${port}`, 'connection already in use'),
      );
    }

    const url = `ws://${host}:${port}`;
    this.logger.info({ url }, 'Connecting to upstream feed');
    const ws = new WebSocket(url);
    this.ws = ws;

    this.closed = new Promise((resolve) => {
      ws.on('close', (code, reason) => {
        this.logger.warn({ code, reason: reason.toString() }, 'Upstream feed closed');
        this.cleanup(ws);
        resolve();
      });
    });

    ws.on('message', (data) => {
      this.processMessage(data.toString());
    });

    ws.on('error', (error) => {
      this.logger.error({ err: error }, 'Upstream feed error');
    });

    return new Promise((resolve, reject) => {
      const onOpen = (): void => {
        ws.off('error', onError);
        this.logger.info({ url }, 'Upstream feed connected');
        this.startHeartbeat(ws);
        resolve();
      };
      const onError = (error: Error): void => {
        ws.off('open', onOpen);
        reject(new UpstreamConnectionError(url, error.message));
      };
      ws.once('open', onOpen);
      ws.once('error', onError);
    });
  }

  /** Requests every channel for `isins` in a single frame. */
  subscribe(isins: string[]): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new UpstreamConnectionError('upstream', 'not connected'));
    }

    this.subscribedIsins = new Set(isins);
    this.logger.info({ count: isins.length }, 'Subscribing to upstream instruments');

    return new Promise((resolve, reject) => {
      ws.send(`${UPSTREAM_SUBSCRIBE_ALL}.${isins.join(',')}`, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  /** Resolves once the current connection has closed. */
  run(): Promise<void> {
    if (!this.closed) {
      return Promise.reject(new UpstreamConnectionError('upstream', 'connect() was not called'));
    }
    return this.closed;
  }

  close(): void {
    if (!this.ws) {
      return;
    }
    this.logger.info('Closing upstream feed connection');
    this.ws.close();
  }

  processMessage(message: string): void {
    this.logger.trace({ message }, 'Upstream frame received');

    let frame: UpstreamFrame;
    try {
      frame = decodeFrame(message);
    } catch (error) {
      this.logger.warn({ err: error }, 'Dropping undecodable upstream frame');
      return;
    }

    for (const [isin, channels] of Object.entries(frame)) {
      if (!this.subscribedIsins.has(isin)) {
        this.logger.warn({ isin }, 'Frame entry for an instrument that was not subscribed');
        continue;
      }
      for (const [channel, fields] of Object.entries(channels)) {
        try {
          this.applyChannel(isin, channel, fields);
        } catch (error) {
          if (!(error instanceof AppError)) {
            throw error;
          }
          this.logger.error({ err: error, isin, channel }, 'Failed to apply upstream channel');
        }
      }
    }
  }

  private applyChannel(isin: string, channel: string, fields: unknown): void {
    switch (channel) {
      case 'thresholds':
        this.repository.applyThresholds(isin, decodeThresholds(fields));
        return;
      case 'trade':
        this.repository.applyTrade(isin, decodeTrade(fields));
        return;
      case 'clienttype':
        // Client types arrive through the market-wide scan only.
        return;
      case 'orderbook':
        throw new NotImplementedError('Order book decoding on the upstream stream');
      default:
        throw new DecodeError(`Unknown message channel: ${channel}`);
    }
  }

  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.ping();
      }
    }, this.options.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private cleanup(ws: WebSocket): void {
    this.stopHeartbeat();
    ws.removeAllListeners();
    if (this.ws === ws) {
      this.ws = null;
    }
  }
}
