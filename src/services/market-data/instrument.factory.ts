import { ORDERBOOK_DEPTH } from '../../config/constants.js';
import type {
  ClientType,
  ClientTypeClass,
  Instrument,
  InstrumentIdentification,
  OrderBookRow,
  OrderBookSide,
  PriceThresholds,
  TradeCandle,
} from '../../types/market-data.types.js';

export function emptyTradeCandle(): TradeCandle {
  return {
    openPrice: 0,
    closePrice: 0,
    lastPrice: 0,
    minPrice: 0,
    maxPrice: 0,
    previousPrice: 0,
    tradeNum: 0,
    tradeVolume: 0,
    tradeValue: 0,
    lastTradeDateTime: null,
  };
}

export function emptyOrderBookRow(): OrderBookRow {
  return {
    demand: { num: 0, volume: 0, price: 0 },
    supply: { num: 0, volume: 0, price: 0 },
  };
}

function emptyClientTypeClass(): ClientTypeClass {
  return { buy: { num: 0, volume: 0 }, sell: { num: 0, volume: 0 } };
}

export function emptyClientType(): ClientType {
  return { legal: emptyClientTypeClass(), natural: emptyClientTypeClass() };
}

export function emptyThresholds(): PriceThresholds {
  return { maxPrice: 0, minPrice: 0 };
}

export function createInstrument(identification: InstrumentIdentification): Instrument {
  return {
    identification: { ...identification },
    tradeCandle: emptyTradeCandle(),
    orderBook: { rows: Array.from({ length: ORDERBOOK_DEPTH }, emptyOrderBookRow) },
    clientType: emptyClientType(),
    thresholds: emptyThresholds(),
  };
}

function sidesEqual(a: OrderBookSide, b: OrderBookSide): boolean {
  return a.num === b.num && a.volume === b.volume && a.price === b.price;
}

export function orderBookRowsEqual(a: OrderBookRow, b: OrderBookRow): boolean {
  return sidesEqual(a.demand, b.demand) && sidesEqual(a.supply, b.supply);
}

function clientTypeClassesEqual(a: ClientTypeClass, b: ClientTypeClass): boolean {
  return (
    a.buy.num === b.buy.num &&
    a.buy.volume === b.buy.volume &&
    a.sell.num === b.sell.num &&
    a.sell.volume === b.sell.volume
  );
}

export function clientTypesEqual(a: ClientType, b: ClientType): boolean {
  return clientTypeClassesEqual(a.legal, b.legal) && clientTypeClassesEqual(a.natural, b.natural);
}

export function thresholdsEqual(a: PriceThresholds, b: PriceThresholds): boolean {
  return a.maxPrice === b.maxPrice && a.minPrice === b.minPrice;
}

export function cloneInstrument(instrument: Instrument): Instrument {
  return structuredClone(instrument);
}
