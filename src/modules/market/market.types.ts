export type CandleInterval = '1h';

export interface Candle {
  time: number; // ms since epoch
  open: number;
  high: number;
  low: number;
  close: number;
}

/**
 * Candles for one pair, ordered newest first.
 */
export type CandleSeries = Candle[];

/**
 * Untyped row as a provider hands it over, before numeric coercion.
 */
export interface RawCandleRow {
  time: number | string | Date | null | undefined;
  open: unknown;
  high: unknown;
  low: unknown;
  close: unknown;
}

export interface CandleProvider {
  readonly name: string;
  isConfigured(): boolean;
  // Resolves null when the provider has nothing usable; may reject on transport errors
  getCandles(pair: string, interval: CandleInterval, minCandles: number): Promise<RawCandleRow[] | null>;
}
