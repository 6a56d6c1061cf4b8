import logger from '../../common/utils/logger';
import { Candle, CandleInterval, CandleProvider, CandleSeries, RawCandleRow } from './market.types';

const toNumber = (value: unknown): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
};

const toTime = (value: RawCandleRow['time']): number => {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string') return Date.parse(value);
  if (typeof value === 'number') return value;
  return Number.NaN;
};

const isPrice = (value: number) => Number.isFinite(value) && value > 0;

/**
 * Coerces provider rows into candles and orders them newest first.
 * Rows with a bad timestamp, a non-positive or non-numeric price, or high < low are dropped.
 */
export const normalizeCandles = (rows: RawCandleRow[]): CandleSeries => {
  const candles: Candle[] = [];

  for (const row of rows) {
    const candle: Candle = {
      time: toTime(row.time),
      open: toNumber(row.open),
      high: toNumber(row.high),
      low: toNumber(row.low),
      close: toNumber(row.close),
    };

    if (
      !Number.isFinite(candle.time) ||
      !isPrice(candle.open) ||
      !isPrice(candle.high) ||
      !isPrice(candle.low) ||
      !isPrice(candle.close) ||
      candle.high < candle.low
    ) {
      continue;
    }
    candles.push(candle);
  }

  return candles.sort((a, b) => b.time - a.time);
};

export class CandleService {
  constructor(private readonly providers: CandleProvider[]) {}

  /**
   * Returns the newest-first series from the first provider that yields at least
   * `minCandles` usable rows, or null when none does.
   */
  async fetch(pair: string, interval: CandleInterval, minCandles: number): Promise<CandleSeries | null> {
    for (const provider of this.providers) {
      if (!provider.isConfigured()) {
        continue;
      }

      try {
        const rows = await provider.getCandles(pair, interval, minCandles);
        if (!rows) {
          continue;
        }

        const series = normalizeCandles(rows);
        if (series.length === 0 || series.length < minCandles) {
          logger.warn(
            { pair, provider: provider.name, count: series.length, required: minCandles },
            'Provider returned too few candles'
          );
          continue;
        }

        logger.debug({ pair, provider: provider.name, count: series.length }, 'Candles fetched');
        return series;
      } catch (error) {
        logger.warn({ err: error, pair, provider: provider.name }, 'Candle provider failed, trying next');
      }
    }

    logger.warn({ pair }, 'No candle provider returned usable data');
    return null;
  }
}
