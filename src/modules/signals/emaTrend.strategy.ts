import { MIN_SIGNAL_CANDLES } from '../market/market.config';
import { latestEma } from './indicators';
import { ISignalStrategy, StrategyContext } from './signal.types';

export const FAST_SPAN = 20;
export const SLOW_SPAN = 50;
export const MIN_VOLATILITY = 0.0008;

export const riskRewardText = (ratio: number) => `${Math.trunc(ratio)}:1`;

export const EmaTrendStrategy: ISignalStrategy = {
  id: 'EMA_TREND',
  name: 'EMA 20/50 Trend',
  requiredHistorySize: MIN_SIGNAL_CANDLES,

  analyze: (ctx: StrategyContext) => {
    const { pair, interval, candles, riskRewardRatio } = ctx;
    if (candles.length < MIN_SIGNAL_CANDLES) return null;

    // The EMA runs forward in time; candles arrive newest first
    const closes = candles.map((c) => c.close).reverse();
    const emaFast = latestEma(closes, FAST_SPAN);
    const emaSlow = latestEma(closes, SLOW_SPAN);
    if (emaFast === null || emaSlow === null) return null;

    const latest = candles[0];
    const direction = emaFast > emaSlow ? 'LONG' : 'SHORT';

    // Latest range stands in for ATR; floored so a flat candle still gets a stop
    const volatilityProxy = Math.max(MIN_VOLATILITY, Math.abs(latest.high - latest.low));
    const entry = latest.close;

    const stopLoss = direction === 'LONG' ? entry - volatilityProxy : entry + volatilityProxy;
    const takeProfit =
      direction === 'LONG' ? entry + volatilityProxy * riskRewardRatio : entry - volatilityProxy * riskRewardRatio;

    return {
      pair,
      interval,
      direction,
      entry,
      stopLoss,
      takeProfit,
      volatilityProxy,
      riskRewardRatio,
      riskRewardText: riskRewardText(riskRewardRatio),
      emaFast,
      emaSlow,
      candleTime: latest.time,
    };
  },
};
