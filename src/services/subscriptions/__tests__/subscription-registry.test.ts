import { describe, it, expect, beforeEach } from 'vitest';
import { SubscriptionRegistry } from '../subscription-registry.js';
import { FOLD, IKCO, RecordingConnection } from '../../../../tests/helpers/market-data.js';

describe('SubscriptionRegistry', () => {
  let registry: SubscriptionRegistry;
  let alice: RecordingConnection;
  let bob: RecordingConnection;

  beforeEach(() => {
    registry = new SubscriptionRegistry();
    alice = new RecordingConnection('alice');
    bob = new RecordingConnection('bob');
  });

  it('should fan an all subscription into every channel', () => {
    registry.apply(alice, { action: 'subscribe', channel: 'all', isins: [FOLD] });

    expect(registry.subscribersOf(FOLD, 'trade').has(alice)).toBe(true);
    expect(registry.subscribersOf(FOLD, 'orderbook').has(alice)).toBe(true);
    expect(registry.subscribersOf(FOLD, 'clienttype').has(alice)).toBe(true);
  });

  it('should look channels up by exact isin', () => {
    registry.apply(alice, { action: 'subscribe', channel: 'trade', isins: [FOLD] });
    registry.apply(bob, { action: 'subscribe', channel: 'trade', isins: [IKCO] });

    expect(Array.from(registry.subscribersOf(FOLD, 'trade'))).toEqual([alice]);
    expect(Array.from(registry.subscribersOf(IKCO, 'trade'))).toEqual([bob]);
    expect(registry.subscribersOf('IRO1XXXX0001', 'trade').size).toBe(0);
  });

  it('should unsubscribe from one channel only', () => {
    registry.apply(alice, { action: 'subscribe', channel: 'all', isins: [FOLD] });
    registry.apply(alice, { action: 'unsubscribe', channel: 'orderbook', isins: [FOLD] });

    expect(registry.subscribersOf(FOLD, 'orderbook').has(alice)).toBe(false);
    expect(registry.subscribersOf(FOLD, 'trade').has(alice)).toBe(true);
    expect(registry.hasSubscriptions(alice)).toBe(true);
  });

  it('should deliver threshold changes to trade subscribers', () => {
    registry.apply(alice, { action: 'subscribe', channel: 'trade', isins: [FOLD] });

    expect(registry.subscribersOf(FOLD, 'thresholds').has(alice)).toBe(true);
  });

  it('should remove a connection from every channel', () => {
    registry.apply(alice, { action: 'subscribe', channel: 'all', isins: [FOLD, IKCO] });
    registry.apply(bob, { action: 'subscribe', channel: 'trade', isins: [FOLD] });

    registry.removeEverywhere(alice);

    expect(registry.hasSubscriptions(alice)).toBe(false);
    expect(Array.from(registry.subscribersOf(FOLD, 'trade'))).toEqual([bob]);
  });

  it('should not create channels for an unsubscribe', () => {
    registry.apply(alice, { action: 'unsubscribe', channel: 'trade', isins: [FOLD] });

    expect(registry.channelCount()).toBe(0);
  });
});
