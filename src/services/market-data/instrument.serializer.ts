import type { ChannelPayload, Instrument } from '../../types/market-data.types.js';
import type { PusherChannel } from '../../types/subscription.types.js';
import { formatTradeDateTime } from '../../utils/timing.js';

export function tradePayload(instrument: Instrument): ChannelPayload {
  const candle = instrument.tradeCandle;
  return {
    trade: [
      candle.closePrice,
      candle.lastPrice,
      candle.lastTradeDateTime ? formatTradeDateTime(candle.lastTradeDateTime) : null,
      candle.maxPrice,
      candle.minPrice,
      candle.openPrice,
      candle.previousPrice,
      candle.tradeNum,
      candle.tradeValue,
      candle.tradeVolume,
    ],
  };
}

/** Full book, or only the given ranks when `ranks` is supplied. */
export function orderBookPayload(instrument: Instrument, ranks?: number[]): ChannelPayload {
  const wanted = ranks ? new Set(ranks) : null;
  return {
    orderbook: instrument.orderBook.rows
      .map((row, rank) => ({ row, rank }))
      .filter(({ rank }) => !wanted || wanted.has(rank))
      .map(({ row, rank }) => [
        rank,
        row.demand.num,
        row.demand.price,
        row.demand.volume,
        row.supply.num,
        row.supply.price,
        row.supply.volume,
      ]),
  };
}

export function clientTypePayload(instrument: Instrument): ChannelPayload {
  const { legal, natural } = instrument.clientType;
  return {
    clienttype: [
      legal.buy.num,
      legal.buy.volume,
      legal.sell.num,
      legal.sell.volume,
      natural.buy.num,
      natural.buy.volume,
      natural.sell.num,
      natural.sell.volume,
    ],
  };
}

export function thresholdsPayload(instrument: Instrument): ChannelPayload {
  return {
    thresholds: [instrument.thresholds.maxPrice, instrument.thresholds.minPrice],
  };
}

export function allPayload(instrument: Instrument): ChannelPayload {
  return {
    ...thresholdsPayload(instrument),
    ...tradePayload(instrument),
    ...orderBookPayload(instrument),
    ...clientTypePayload(instrument),
  };
}

/** Payload answering a subscribe command on `channel`. */
export function initialPayload(channel: PusherChannel, instrument: Instrument): ChannelPayload {
  switch (channel) {
    case 'all':
      return allPayload(instrument);
    case 'trade':
      return tradePayload(instrument);
    case 'orderbook':
      return orderBookPayload(instrument);
    case 'clienttype':
      return clientTypePayload(instrument);
  }
}
