import { PeriodStats } from '../../modules/account/ledger.service';
import { lot, money, signedMoney, stamp } from './format';

export interface SessionOpenMessage {
  botName: string;
  traderName: string;
  sessionDays: string;
  sessionStart: string;
  sessionEnd: string;
  timezone: string;
  capital: number;
  lotSize: number;
  riskAmount: number;
  riskPercent: number;
  leverage: number;
}

export const generateSessionOpenTemplate = (msg: SessionOpenMessage): string =>
  [
    `🌅 Good morning, ${msg.traderName}!`,
    `🕊️ ${msg.botName} is scanning the forex skies for fresh entries ☁️💹`,
    `⚙️ Session Active: ${msg.sessionDays} | ${msg.sessionStart}–${msg.sessionEnd} (${msg.timezone})`,
    `💵 Capital: ${money(msg.capital)} | Lot: ${lot(msg.lotSize)} | Risk: ${money(msg.riskAmount)} (${msg.riskPercent}%) | Leverage: 1:${msg.leverage}`,
    '📊 Mode: Fixed Risk + Real Balance Tracking',
  ].join('\n');

/**
 * @param nextSession already formatted, e.g. "Monday 10:00", or null when nothing is scheduled
 */
export const generateWeekendRestTemplate = (botName: string, nextSession: string | null, timezone: string): string =>
  [
    '⚠️ Market cooling down...',
    `🕊️ ${botName} entering weekend rest mode 😴📉`,
    nextSession === null
      ? '📅 Next Active Session: not scheduled'
      : `📅 Next Active Session: ${nextSession} (${timezone})`,
    '💬 Rest, review & reset your mindset 🧭🔥',
  ].join('\n');

export const generateMonthlyResetTemplate = (monthLabel: string, closed: PeriodStats, startingCapital: number): string => {
  const trades = closed.wins + closed.losses;
  const accuracy = trades === 0 ? 'n/a' : `${Math.round((closed.wins / trades) * 100)}%`;

  return [
    '🔁 Monthly Auto-Reset Complete!',
    `📅 New Month: ${monthLabel}`,
    '📊 Previous Stats:',
    `Wins: ${closed.wins} | Losses: ${closed.losses} | Profit: ${signedMoney(closed.netProfit)} | Accuracy: ${accuracy}`,
    `💵 New Starting Capital: ${money(startingCapital)}`,
    '⚙️ Mode: Fixed Risk + Real Balance Tracking',
    '🧭 Fresh cycle ready 💹',
  ].join('\n');
};

export const generateDeploymentTemplate = (
  botName: string,
  pairs: string[],
  timestamp: string,
  timezone: string
): string =>
  [
    `🚀 [${botName} DEPLOYMENT STATUS]`,
    '✅ Successfully Deployed and Running 💹',
    stamp(timestamp, timezone),
    '🧠 System Scan: Ready | Candle Feed: Active',
    `📡 Markets: ${pairs.join(', ')}`,
  ].join('\n');
