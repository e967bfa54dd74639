export interface InstrumentIdentification {
  /** 12-character code, the external key in both feed protocols. */
  isin: string;
  /** Exchange numeric code; only the bulk market-watch rows carry it. */
  tsetmcCode: string;
  ticker: string;
  name: string;
}

export interface TradeCandle {
  openPrice: number;
  closePrice: number;
  lastPrice: number;
  minPrice: number;
  maxPrice: number;
  previousPrice: number;
  tradeNum: number;
  tradeVolume: number;
  tradeValue: number;
  lastTradeDateTime: Date | null;
}

export interface OrderBookSide {
  num: number;
  volume: number;
  price: number;
}

export interface OrderBookRow {
  demand: OrderBookSide;
  supply: OrderBookSide;
}

export interface OrderBook {
  rows: OrderBookRow[];
}

export interface ClientTypeSide {
  num: number;
  volume: number;
}

export interface ClientTypeClass {
  buy: ClientTypeSide;
  sell: ClientTypeSide;
}

export interface ClientType {
  legal: ClientTypeClass;
  natural: ClientTypeClass;
}

export interface PriceThresholds {
  maxPrice: number;
  minPrice: number;
}

export interface Instrument {
  identification: InstrumentIdentification;
  tradeCandle: TradeCandle;
  orderBook: OrderBook;
  clientType: ClientType;
  thresholds: PriceThresholds;
}

/** One row of the market-wide trade scan. */
export interface MarketWatchTradeRow {
  identification: InstrumentIdentification;
  tradeCandle: Omit<TradeCandle, 'lastTradeDateTime'>;
  /** `HH:MM:SS`, combined with the current date when applied. */
  lastTradeTime: string;
  orderBookRows: OrderBookRow[];
}

/** One row of the market-wide client-type scan, keyed by exchange code. */
export interface MarketWatchClientTypeRow {
  tsetmcCode: string;
  clientType: ClientType;
}

export type DataChannel = 'trade' | 'orderbook' | 'clienttype' | 'thresholds';

export type ChangeNotification =
  | { channel: 'trade'; isin: string }
  | { channel: 'thresholds'; isin: string }
  | { channel: 'clienttype'; isin: string }
  | { channel: 'orderbook'; isin: string; ranks: number[] };

export interface ChangeSink {
  onChange(notification: ChangeNotification): Promise<void>;
}

/** Field arrays keyed by channel name, as sent on the wire. */
export type ChannelPayload = Partial<Record<DataChannel, unknown[]>>;

/** Wire envelope: ISIN → channel name → field array. */
export type PushEnvelope = Record<string, ChannelPayload>;
