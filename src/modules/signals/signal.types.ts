import { CandleInterval, CandleSeries } from '../market/market.types';

export type Direction = 'LONG' | 'SHORT';

export interface Signal {
  pair: string;
  interval: CandleInterval;
  direction: Direction;
  entry: number;
  stopLoss: number;
  takeProfit: number;
  volatilityProxy: number;
  riskRewardRatio: number;
  riskRewardText: string; // e.g. "2:1"
  emaFast: number;
  emaSlow: number;
  candleTime: number;
}

export interface StrategyContext {
  pair: string;
  interval: CandleInterval;
  candles: CandleSeries; // Ordered newest first
  riskRewardRatio: number;
}

export interface ISignalStrategy {
  id: string;
  name: string;
  requiredHistorySize: number; // How many candles needed before a signal is produced

  // Returns null when there is not enough history
  analyze: (ctx: StrategyContext) => Signal | null;
}
