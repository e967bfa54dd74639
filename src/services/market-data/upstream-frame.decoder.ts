import { z } from 'zod';
import type { PriceThresholds, TradeCandle } from '../../types/market-data.types.js';
import { DecodeError } from '../../utils/errors.js';

const integer = z
  .union([z.number(), z.string().regex(/^-?\d+$/)])
  .transform(Number)
  .pipe(z.number().int().safe());

const WALL_CLOCK = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/;

// Keeps the wall-clock time the feed sent; any UTC offset is dropped.
const timestamp = z
  .string()
  .datetime({ local: true, offset: true })
  .transform((value, ctx) => {
    const match = WALL_CLOCK.exec(value);
    if (!match) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid ISO-8601 timestamp' });
      return z.NEVER;
    }
    const [, year, month, day, hours, minutes, seconds = '0'] = match;
    return new Date(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours),
      Number(minutes),
      Number(seconds),
    );
  });

// Channel payloads are checked per channel so one bad entry does not sink the frame.
const frameSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

// [max_price, min_price]
const thresholdsSchema = z.tuple([integer, integer]);

// [close, last, last_trade_time, max, min, open, previous, trade_num, trade_value, trade_volume]
const tradeSchema = z.tuple([
  integer,
  integer,
  timestamp,
  integer,
  integer,
  integer,
  integer,
  integer,
  integer,
  integer,
]);

export type UpstreamFrame = z.infer<typeof frameSchema>;

export function decodeFrame(raw: string): UpstreamFrame {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new DecodeError('Frame is not valid JSON', { cause: String(error) });
  }
  const parsed = frameSchema.safeParse(json);
  if (!parsed.success) {
    throw new DecodeError('Frame does not map ISINs to channel objects', parsed.error.issues);
  }
  return parsed.data;
}

export function decodeThresholds(fields: unknown): PriceThresholds {
  const parsed = thresholdsSchema.safeParse(fields);
  if (!parsed.success) {
    throw new DecodeError('Malformed thresholds fields', parsed.error.issues);
  }
  const [maxPrice, minPrice] = parsed.data;
  return { maxPrice, minPrice };
}

export function decodeTrade(fields: unknown): TradeCandle {
  const parsed = tradeSchema.safeParse(fields);
  if (!parsed.success) {
    throw new DecodeError('Malformed trade fields', parsed.error.issues);
  }
  const [
    closePrice,
    lastPrice,
    lastTradeDateTime,
    maxPrice,
    minPrice,
    openPrice,
    previousPrice,
    tradeNum,
    tradeValue,
    tradeVolume,
  ] = parsed.data;
  return {
    closePrice,
    lastPrice,
    lastTradeDateTime,
    maxPrice,
    minPrice,
    openPrice,
    previousPrice,
    tradeNum,
    tradeValue,
    tradeVolume,
  };
}
