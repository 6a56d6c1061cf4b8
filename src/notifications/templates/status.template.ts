import { AccountSnapshot } from '../../modules/account/ledger.service';
import { lot, money, stamp } from './format';

export type FeedState = 'unknown' | 'active' | 'degraded';

export interface StatusMessage {
  botName: string;
  account: AccountSnapshot;
  strategy: string;
  riskRewardText: string;
  lotSize: number;
  leverage: number;
  pairs: string[];
  sessionOpen: boolean;
  simulateOutcomes: boolean;
  feed: FeedState;
  missingPairs: string[];
  timestamp: string;
  timezone: string;
}

const feedLine = (feed: FeedState, missingPairs: string[]) => {
  switch (feed) {
    case 'active':
      return '❤️‍🔥 Candle Feed: Active ✅';
    case 'degraded':
      return `⚠️ Candle Feed: Degraded (${missingPairs.join(', ')})`;
    default:
      return '⏳ Candle Feed: Not checked yet';
  }
};

export const generateStatusTemplate = (msg: StatusMessage): string =>
  [
    `📡 [${msg.botName} STATUS CHECK]`,
    stamp(msg.timestamp, msg.timezone),
    `💵 Current Balance: ${money(msg.account.currentCapital)}`,
    `⚙️ Risk: ${msg.account.riskPercent}% | RR: ${msg.riskRewardText} | Lot: ${lot(msg.lotSize)} | Leverage: 1:${msg.leverage}`,
    `📈 Markets: ${msg.pairs.join(', ')}`,
    msg.sessionOpen ? '🟢 Session: Open' : '🌙 Session: Weekend rest',
    `🎲 Demo Results: ${msg.simulateOutcomes ? 'On' : 'Off'}`,
    feedLine(msg.feed, msg.missingPairs),
    `🧠 Strategy: ${msg.strategy}`,
    '🧭 System: Stable and Ready 💹',
  ].join('\n');
