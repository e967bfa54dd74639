import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createApp } from '../app.js';
import { MarketPusherGateway } from '../market-pusher.gateway.js';
import { MarketRealtimeRepository } from '../../services/market-data/market-realtime.repository.js';
import {
  FOLD,
  IKCO,
  RecordingConnection,
  StalledConnection,
  candle,
  identification,
  orderBookRow,
} from '../../../tests/helpers/market-data.js';

describe('MarketPusherGateway', () => {
  let app: FastifyInstance;
  let repository: MarketRealtimeRepository;
  let gateway: MarketPusherGateway;

  beforeEach(async () => {
    app = await createApp();
    repository = new MarketRealtimeRepository();
    repository.registerInstruments([identification(FOLD), identification(IKCO)]);
    gateway = new MarketPusherGateway(app, repository, { path: '/', sendTimeoutMs: 50 });
  });

  afterEach(async () => {
    gateway.close();
    await app.close();
  });

  function connect(id: string): RecordingConnection {
    const connection = new RecordingConnection(id);
    gateway.openConnection(connection);
    return connection;
  }

  describe('handleCommand', () => {
    it('should answer a trade subscription with the current candle only', () => {
      repository.applyTrade(FOLD, candle());
      const client = connect('client');

      const response = gateway.handleCommand(client, `1.trade.${FOLD}`);

      expect(response).toEqual({
        [FOLD]: {
          trade: [1010, 1020, '2024/05/12 10:15:30', 1030, 990, 1000, 1005, 12, 3468000, 3400],
        },
      });
    });

    it('should leave unknown instruments out of the snapshot', () => {
      const client = connect('client');

      const response = gateway.handleCommand(client, `1.clienttype.${FOLD},IRO1XXXX0001`);

      expect(Object.keys(response ?? {})).toEqual([FOLD]);
      expect(gateway.channelCount()).toBe(2);
    });

    it('should return nothing when no requested instrument is known', () => {
      const client = connect('client');

      expect(gateway.handleCommand(client, '1.trade.IRO1XXXX0001')).toBeNull();
      expect(gateway.connectionState(client)).toBe('active');
    });

    it('should ignore a malformed command', () => {
      const client = connect('client');

      expect(gateway.handleCommand(client, `1.bogus.${FOLD}`)).toBeNull();
      expect(gateway.connectionState(client)).toBe('open');
      expect(gateway.channelCount()).toBe(0);
    });

    it('should reject a command whose isin list holds one bad isin', () => {
      const client = connect('client');

      expect(gateway.handleCommand(client, `1.trade.${FOLD},IRO1IKCO00011`)).toBeNull();
      expect(gateway.channelCount()).toBe(0);
    });

    it('should move between open and active as subscriptions come and go', () => {
      const client = connect('client');
      expect(gateway.connectionState(client)).toBe('open');

      gateway.handleCommand(client, `1.orderbook.${FOLD}`);
      expect(gateway.connectionState(client)).toBe('active');

      expect(gateway.handleCommand(client, `0.orderbook.${FOLD}`)).toBeNull();
      expect(gateway.connectionState(client)).toBe('open');
    });

    it('should ignore commands after the connection closed', () => {
      const client = connect('client');
      gateway.closeConnection(client);

      expect(gateway.handleCommand(client, `1.trade.${FOLD}`)).toBeNull();
      expect(gateway.connectionState(client)).toBe('closed');
      expect(gateway.channelCount()).toBe(0);
    });
  });

  describe('change dispatch', () => {
    it('should stop pushing order book changes after unsubscribe', async () => {
      const leaving = connect('leaving');
      const staying = connect('staying');
      gateway.handleCommand(leaving, `1.orderbook.${FOLD}`);
      gateway.handleCommand(staying, `1.orderbook.${FOLD}`);

      gateway.handleCommand(leaving, `0.orderbook.${FOLD}`);
      repository.applyOrderBookSnapshot(FOLD, [
        { demand: { num: 0, volume: 0, price: 0 }, supply: { num: 0, volume: 0, price: 0 } },
        orderBookRow(4),
        { demand: { num: 0, volume: 0, price: 0 }, supply: { num: 0, volume: 0, price: 0 } },
      ]);

      await vi.waitFor(() => expect(staying.messages).toHaveLength(1));
      expect(JSON.parse(staying.messages[0])).toEqual({
        [FOLD]: { orderbook: [[1, 4, 996, 400, 5, 1004, 800]] },
      });
      expect(leaving.messages).toEqual([]);
    });

    it('should deliver to a healthy subscriber while another never drains', async () => {
      const stalled = new StalledConnection('stalled');
      gateway.openConnection(stalled);
      const healthy = connect('healthy');
      gateway.handleCommand(stalled, `1.trade.${FOLD}`);
      gateway.handleCommand(healthy, `1.trade.${FOLD}`);

      await gateway.onChange({ channel: 'trade', isin: FOLD });

      expect(healthy.messages).toHaveLength(1);
    });

    it('should push only to subscribers of the changed instrument', async () => {
      const foldClient = connect('fold');
      const ikcoClient = connect('ikco');
      gateway.handleCommand(foldClient, `1.all.${FOLD}`);
      gateway.handleCommand(ikcoClient, `1.all.${IKCO}`);

      repository.applyTrade(IKCO, candle());

      await vi.waitFor(() => expect(ikcoClient.messages).toHaveLength(1));
      expect(foldClient.messages).toEqual([]);
    });

    it('should push threshold changes to trade subscribers', async () => {
      const client = connect('client');
      gateway.handleCommand(client, `1.trade.${FOLD}`);

      repository.applyThresholds(FOLD, { maxPrice: 1100, minPrice: 900 });

      await vi.waitFor(() => expect(client.messages).toHaveLength(1));
      expect(JSON.parse(client.messages[0])).toEqual({ [FOLD]: { thresholds: [1100, 900] } });
    });

    it('should forget a closed connection', async () => {
      const client = connect('client');
      gateway.handleCommand(client, `1.all.${FOLD}`);
      gateway.closeConnection(client);

      await gateway.onChange({ channel: 'trade', isin: FOLD });

      expect(client.messages).toEqual([]);
      expect(gateway.connectionCount()).toBe(0);
    });
  });
});
