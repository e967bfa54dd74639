export const ISIN_LENGTH = 12;

/** Number of ranked rows kept per order book; rank 0 is the best price. */
export const ORDERBOOK_DEPTH = 3;

export const PUSHER_ACTIONS = {
  UNSUBSCRIBE: '0',
  SUBSCRIBE: '1',
} as const;

export const PUSHER_CHANNELS = ['all', 'trade', 'orderbook', 'clienttype'] as const;

// Upstream subscribe request prefix: subscribe action + all channels.
export const UPSTREAM_SUBSCRIBE_ALL = `${PUSHER_ACTIONS.SUBSCRIBE}.all`;

export const HEALTH_ROUTE = '/health';
