import YahooFinance from 'yahoo-finance2';
import logger from '../../common/utils/logger';
import { toYahooSymbol } from './market.config';
import { CandleInterval, CandleProvider, RawCandleRow } from './market.types';

export interface ChartQuery {
  period1: Date;
  period2: Date;
  interval: '1h';
}

export type ChartFetcher = (symbol: string, query: ChartQuery) => Promise<RawCandleRow[]>;

// Create ONE shared instance
const yahooFinance = new YahooFinance();

const fetchChart: ChartFetcher = async (symbol, query) => {
  const result = await yahooFinance.chart(symbol, query);
  return result.quotes.map((q) => ({
    time: q.date,
    open: q.open,
    high: q.high,
    low: q.low,
    close: q.close,
  }));
};

// yahoo-finance2 takes no request timeout, so the call is raced against a timer
const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });

interface YahooOptions {
  lookbackDays: number;
  timeoutMs: number;
  fetcher?: ChartFetcher;
  now?: () => Date;
}

export class YahooProvider implements CandleProvider {
  readonly name = 'yahoo';
  private lookbackDays: number;
  private timeoutMs: number;
  private fetcher: ChartFetcher;
  private now: () => Date;

  constructor(options: YahooOptions) {
    this.lookbackDays = Math.max(2, options.lookbackDays);
    this.timeoutMs = options.timeoutMs;
    this.fetcher = options.fetcher ?? fetchChart;
    this.now = options.now ?? (() => new Date());
  }

  isConfigured(): boolean {
    return true;
  }

  async getCandles(pair: string, interval: CandleInterval, _minCandles: number): Promise<RawCandleRow[] | null> {
    const symbol = toYahooSymbol(pair);
    const period2 = this.now();
    const period1 = new Date(period2.getTime() - this.lookbackDays * 24 * 60 * 60 * 1000);

    logger.debug({ symbol, period1, period2 }, 'Fetching chart data from Yahoo Finance');
    const rows = await withTimeout(
      this.fetcher(symbol, { period1, period2, interval }),
      this.timeoutMs,
      `Yahoo chart ${symbol}`
    );

    if (rows.length === 0) {
      logger.warn({ symbol }, 'Yahoo Finance returned empty quotes');
      return null;
    }

    // Yahoo returns oldest first; put the latest candle on top
    return [...rows].reverse();
  }
}
