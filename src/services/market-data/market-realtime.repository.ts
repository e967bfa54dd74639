import type {
  ChangeNotification,
  ChangeSink,
  ClientType,
  Instrument,
  InstrumentIdentification,
  MarketWatchClientTypeRow,
  MarketWatchTradeRow,
  OrderBookRow,
  PriceThresholds,
  TradeCandle,
} from '../../types/market-data.types.js';
import { InstrumentNotFoundError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { combineDateAndTime, timeOfDay } from '../../utils/timing.js';
import {
  clientTypesEqual,
  cloneInstrument,
  createInstrument,
  orderBookRowsEqual,
  thresholdsEqual,
} from './instrument.factory.js';

type ApplyTradeOptions = {
  /** Creates the instrument when the ISIN is unknown (bulk scans only). */
  identification?: InstrumentIdentification;
};

/**
 * Sole owner of the realtime instrument records, keyed by ISIN.
 *
 * Every method that compares and mutates runs to completion without
 * yielding, so it is exclusive with respect to all other callers on the
 * event loop. Notifications go to the sink only after the mutation is done.
 */
export class MarketRealtimeRepository {
  private instruments = new Map<string, Instrument>();
  private sink: ChangeSink | null = null;
  private logger = getLogger();

  registerChangeSink(sink: ChangeSink): void {
    if (this.sink && this.sink !== sink) {
      this.logger.warn('Replacing the registered change sink');
    }
    this.sink = sink;
  }

  registerInstruments(identifications: InstrumentIdentification[]): void {
    for (const identification of identifications) {
      if (!this.instruments.has(identification.isin)) {
        this.instruments.set(identification.isin, createInstrument(identification));
      }
    }
    this.logger.info({ count: this.instruments.size }, 'Instrument universe registered');
  }

  instrumentCount(): number {
    return this.instruments.size;
  }

  snapshot(isin: string): Instrument | null {
    const instrument = this.instruments.get(isin);
    return instrument ? cloneInstrument(instrument) : null;
  }

  snapshots(isins: string[]): Array<Instrument | null> {
    return isins.map((isin) => this.snapshot(isin));
  }

  /**
   * Overwrites the candle unless the last trade carries the time of day
   * already recorded. Returns whether anything changed.
   */
  applyTrade(isin: string, candle: TradeCandle, options: ApplyTradeOptions = {}): boolean {
    const changed = this.mutateTrade(isin, candle, options);
    if (changed) {
      this.emit({ channel: 'trade', isin });
    }
    return changed;
  }

  applyThresholds(isin: string, thresholds: PriceThresholds): boolean {
    const instrument = this.require(isin);
    if (thresholdsEqual(instrument.thresholds, thresholds)) {
      return false;
    }
    instrument.thresholds = { ...thresholds };
    this.emit({ channel: 'thresholds', isin });
    return true;
  }

  applyClientTypeSnapshot(isin: string, clientType: ClientType): boolean {
    const changed = this.mutateClientType(this.require(isin), clientType);
    if (changed) {
      this.emit({ channel: 'clienttype', isin });
    }
    return changed;
  }

  /** Returns the ranks that differed from the stored rows. */
  applyOrderBookSnapshot(isin: string, rows: OrderBookRow[]): number[] {
    const ranks = this.mutateOrderBook(this.require(isin), rows);
    if (ranks.length > 0) {
      this.emit({ channel: 'orderbook', isin, ranks });
    }
    return ranks;
  }

  /** Applies a market-wide trade scan, creating instruments it has not seen. */
  applyMarketWatchTrades(rows: MarketWatchTradeRow[], today: Date = new Date()): void {
    const notifications: ChangeNotification[] = [];

    for (const row of rows) {
      const isin = row.identification.isin;
      const candle: TradeCandle = {
        ...row.tradeCandle,
        lastTradeDateTime: combineDateAndTime(today, row.lastTradeTime),
      };
      if (this.mutateTrade(isin, candle, { identification: row.identification })) {
        notifications.push({ channel: 'trade', isin });
      }
      const ranks = this.mutateOrderBook(this.require(isin), row.orderBookRows);
      if (ranks.length > 0) {
        notifications.push({ channel: 'orderbook', isin, ranks });
      }
    }

    notifications.forEach((notification) => this.emit(notification));
  }

  /** Applies a market-wide client-type scan; rows for unknown codes are skipped. */
  applyMarketWatchClientTypes(rows: MarketWatchClientTypeRow[]): void {
    const byCode = new Map<string, Instrument>();
    for (const instrument of this.instruments.values()) {
      byCode.set(instrument.identification.tsetmcCode, instrument);
    }

    const notifications: ChangeNotification[] = [];
    for (const row of rows) {
      const instrument = byCode.get(row.tsetmcCode);
      if (!instrument) {
        continue;
      }
      if (this.mutateClientType(instrument, row.clientType)) {
        notifications.push({ channel: 'clienttype', isin: instrument.identification.isin });
      }
    }

    notifications.forEach((notification) => this.emit(notification));
  }

  private mutateTrade(isin: string, candle: TradeCandle, options: ApplyTradeOptions): boolean {
    let instrument = this.instruments.get(isin);
    if (!instrument) {
      if (!options.identification) {
        throw new InstrumentNotFoundError(isin);
      }
      instrument = createInstrument(options.identification);
      this.instruments.set(isin, instrument);
      this.logger.debug({ isin }, 'Instrument created from market scan');
    }

    const stored = instrument.tradeCandle.lastTradeDateTime;
    const incoming = candle.lastTradeDateTime;
    if (stored && incoming && timeOfDay(stored) === timeOfDay(incoming)) {
      return false;
    }

    instrument.tradeCandle = {
      ...candle,
      lastTradeDateTime: incoming ? new Date(incoming.getTime()) : null,
    };
    return true;
  }

  private mutateClientType(instrument: Instrument, clientType: ClientType): boolean {
    if (clientTypesEqual(instrument.clientType, clientType)) {
      return false;
    }
    instrument.clientType = structuredClone(clientType);
    return true;
  }

  private mutateOrderBook(instrument: Instrument, rows: OrderBookRow[]): number[] {
    const stored = instrument.orderBook.rows;
    const ranks: number[] = [];
    const depth = Math.min(stored.length, rows.length);

    if (rows.length > stored.length) {
      this.logger.debug(
        { isin: instrument.identification.isin, received: rows.length, depth: stored.length },
        'Order book rows beyond depth ignored',
      );
    }

    for (let rank = 0; rank < depth; rank++) {
      if (!orderBookRowsEqual(stored[rank], rows[rank])) {
        stored[rank] = structuredClone(rows[rank]);
        ranks.push(rank);
      }
    }
    return ranks;
  }

  private require(isin: string): Instrument {
    const instrument = this.instruments.get(isin);
    if (!instrument) {
      throw new InstrumentNotFoundError(isin);
    }
    return instrument;
  }

  private emit(notification: ChangeNotification): void {
    if (!this.sink) {
      return;
    }
    this.sink.onChange(notification).catch((error: unknown) => {
      this.logger.error({ err: error, notification }, 'Change sink failed');
    });
  }
}
