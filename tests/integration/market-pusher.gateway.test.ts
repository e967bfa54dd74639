import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import WebSocket from 'ws';
import { createApp } from '../../src/server/app.js';
import { MarketPusherGateway } from '../../src/server/market-pusher.gateway.js';
import { registerRoutes } from '../../src/routes/index.js';
import { MarketRealtimeRepository } from '../../src/services/market-data/market-realtime.repository.js';
import { FOLD, IKCO, candle, identification } from '../helpers/market-data.js';

function openClient(url: string): Promise<{ socket: WebSocket; messages: string[] }> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url);
    const messages: string[] = [];
    socket.on('message', (data) => messages.push(data.toString()));
    socket.once('open', () => resolve({ socket, messages }));
    socket.once('error', reject);
  });
}

describe('Market pusher over WebSocket', () => {
  let app: FastifyInstance;
  let repository: MarketRealtimeRepository;
  let gateway: MarketPusherGateway;
  let url: string;
  let upstreamConnected = false;

  beforeAll(async () => {
    app = await createApp();
    repository = new MarketRealtimeRepository();
    repository.registerInstruments([identification(FOLD), identification(IKCO)]);
    repository.applyTrade(FOLD, candle());
    gateway = new MarketPusherGateway(app, repository, { path: '/', sendTimeoutMs: 1000 });
    await registerRoutes(app, {
      repository,
      gateway,
      ingestion: { isConnected: () => upstreamConnected },
    });
    await app.listen({ port: 0, host: '127.0.0.1' });
    const address = app.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    url = `ws://127.0.0.1:${address.port}/`;
  });

  afterAll(async () => {
    gateway.close();
    await app.close();
  });

  it('should answer a subscribe and then push changes', async () => {
    const { socket, messages } = await openClient(url);

    socket.send(`1.trade.${FOLD}`);
    await vi.waitFor(() => expect(messages).toHaveLength(1));
    expect(JSON.parse(messages[0])).toEqual({
      [FOLD]: {
        trade: [1010, 1020, '2024/05/12 10:15:30', 1030, 990, 1000, 1005, 12, 3468000, 3400],
      },
    });

    repository.applyTrade(
      FOLD,
      candle({ lastPrice: 1025, lastTradeDateTime: new Date(2024, 4, 12, 10, 16, 0) }),
    );
    await vi.waitFor(() => expect(messages).toHaveLength(2));
    expect(JSON.parse(messages[1])[FOLD].trade[1]).toBe(1025);

    socket.close();
  });

  it('should drop a closed connection from every subscriber set', async () => {
    const { socket } = await openClient(url);
    socket.send(`1.all.${IKCO}`);
    await vi.waitFor(() => expect(gateway.connectionCount()).toBeGreaterThan(0));

    socket.close();

    await vi.waitFor(() => expect(gateway.connectionCount()).toBe(0));
  });

  it('should report upstream state on the health route', async () => {
    upstreamConnected = false;
    const down = await app.inject({ method: 'GET', url: '/health' });
    expect(down.statusCode).toBe(503);
    expect(JSON.parse(down.body).upstream).toBe('disconnected');

    upstreamConnected = true;
    const up = await app.inject({ method: 'GET', url: '/health' });
    expect(up.statusCode).toBe(200);
    expect(JSON.parse(up.body).instruments).toBe(2);
  });
});
