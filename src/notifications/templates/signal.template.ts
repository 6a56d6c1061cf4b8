import { PositionRisk } from '../../modules/account/ledger.service';
import { pipSize } from '../../modules/market/market.config';
import { Signal } from '../../modules/signals/signal.types';
import { lot, money, price, stamp } from './format';

export interface SignalMessage {
  botName: string;
  signal: Signal;
  signalId: string;
  risk: PositionRisk;
  lotSize: number;
  timestamp: string;
  timezone: string;
}

export interface OutcomeMessage {
  botName: string;
  signal: Signal;
  won: boolean;
  amount: number;
  balance: number;
}

export const generateSignalTemplate = (msg: SignalMessage): string => {
  const { signal } = msg;
  const headline =
    signal.direction === 'LONG' ? '🚀 BUY | Bullish trend confirmed' : '📉 SELL | Bearish trend confirmed';

  return [
    `📡 [${msg.botName} SIGNAL] ${signal.pair} ${signal.interval}`,
    headline,
    `💹 Entry: ${price(signal.entry)}`,
    `🛑 SL: ${price(signal.stopLoss)} | 🎯 TP: ${price(signal.takeProfit)} (RR ${signal.riskRewardText})`,
    `⚙️ Indicators: EMA20 ${price(signal.emaFast)} / EMA50 ${price(signal.emaSlow)} | ATR≈${signal.volatilityProxy.toFixed(4)}`,
    stamp(msg.timestamp, msg.timezone),
    `📦 Lot: ${lot(msg.lotSize)} | 💰 Risk: ${money(msg.risk.riskAmount)} | Reward: ${money(msg.risk.rewardAmount)}`,
    '━━━━━━━━━━━━━━━━━━━━━━━',
    '🚦 Status: Awaiting movement...',
    `🆔 ${msg.signalId}`,
  ].join('\n');
};

export const generateOutcomeTemplate = (msg: OutcomeMessage): string => {
  const { signal } = msg;
  const pip = pipSize(signal.pair);

  if (msg.won) {
    const pips = Math.abs(signal.takeProfit - signal.entry) / pip;
    return [
      `🏆 [${msg.botName} RESULT] ${signal.pair} ${signal.interval}`,
      `✅ WIN! 🎯 TP hit at ${price(signal.takeProfit)}`,
      `📈 +${pips.toFixed(1)} pips | 💰 +${money(msg.amount)}`,
      `📊 New Balance: ${money(msg.balance)} 🏦`,
    ].join('\n');
  }

  const pips = Math.abs(signal.entry - signal.stopLoss) / pip;
  return [
    `💥 [${msg.botName} RESULT] ${signal.pair} ${signal.interval}`,
    `❌ LOSS: SL hit at ${price(signal.stopLoss)}`,
    `📉 -${pips.toFixed(1)} pips | 💸 -${money(msg.amount)}`,
    `📊 Updated Balance: ${money(msg.balance)} 🏦`,
  ].join('\n');
};
