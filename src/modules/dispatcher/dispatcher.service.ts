import { AppConfig } from '../../config/config';
import logger from '../../common/utils/logger';
import {
  SessionCalendar,
  describeSessionDays,
  isSessionOpen,
  localTime,
  nextSessionStart,
} from '../../common/utils/marketHours';
import { MessagingTransport } from '../../notifications/telegram.service';
import { generateHeartbeatTemplate, PairPulse } from '../../notifications/templates/heartbeat.template';
import {
  generateDeploymentTemplate,
  generateMonthlyResetTemplate,
  generateSessionOpenTemplate,
  generateWeekendRestTemplate,
} from '../../notifications/templates/session.template';
import { generateOutcomeTemplate, generateSignalTemplate } from '../../notifications/templates/signal.template';
import { FeedState, generateStatusTemplate } from '../../notifications/templates/status.template';
import { AccountSnapshot, LedgerService } from '../account/ledger.service';
import { compactPair } from '../market/market.config';
import { CandleInterval, CandleSeries } from '../market/market.types';
import { riskRewardText } from '../signals/emaTrend.strategy';
import { ISignalStrategy } from '../signals/signal.types';

export interface CandleSource {
  fetch(pair: string, interval: CandleInterval, minCandles: number): Promise<CandleSeries | null>;
}

export interface DispatcherDeps {
  config: AppConfig;
  candles: CandleSource;
  strategy: ISignalStrategy;
  ledger: LedgerService;
  transport: MessagingTransport;
  clock?: () => Date;
  random?: () => number;
}

export interface ScanSummary {
  sessionOpen: boolean;
  signalsSent: number;
  outcomesApplied: number;
  skippedPairs: string[];
}

export interface StatusSnapshot {
  account: AccountSnapshot;
  strategy: string;
  pairs: string[];
  sessionOpen: boolean;
  simulateOutcomes: boolean;
  feed: FeedState;
  missingPairs: string[];
  time: string;
}

// Share of simulated outcomes that count as a win
const DEMO_WIN_THRESHOLD = 0.35;

export class DispatcherService {
  private readonly config: AppConfig;
  private readonly candles: CandleSource;
  private readonly strategy: ISignalStrategy;
  private readonly ledger: LedgerService;
  private readonly transport: MessagingTransport;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly calendar: SessionCalendar;

  // Feed health per pair, reported by the status query
  private readonly feed = new Map<string, boolean>();

  constructor(deps: DispatcherDeps) {
    this.config = deps.config;
    this.candles = deps.candles;
    this.strategy = deps.strategy;
    this.ledger = deps.ledger;
    this.transport = deps.transport;
    this.clock = deps.clock ?? (() => new Date());
    this.random = deps.random ?? Math.random;
    this.calendar = {
      timezone: deps.config.market.timezone,
      offWeekdays: deps.config.market.offWeekdays,
      sessionStart: deps.config.market.sessionStart,
    };
  }

  private get botName() {
    return this.config.branding.botName;
  }

  private timestamp(now: Date) {
    return localTime(now, this.calendar.timezone).format('YYYY-MM-DD HH:mm');
  }

  private signalId(pair: string, now: Date) {
    return `${compactPair(pair)}|${this.config.market.interval}|${localTime(now, this.calendar.timezone).format('MMDDHHmm')}`;
  }

  private async fetchCandles(pair: string, minCandles: number) {
    const series = await this.candles.fetch(pair, this.config.market.interval, minCandles);
    if (series) {
      this.feed.set(pair, true);
    } else if (minCandles <= 1) {
      // Only a miss on a single-candle request means no data arrived; a longer window can just be short
      this.feed.set(pair, false);
    }
    return series;
  }

  isSessionOpen(now = this.clock()): boolean {
    return isSessionOpen(now, this.calendar);
  }

  async runSignalScan(): Promise<ScanSummary> {
    const now = this.clock();
    const summary: ScanSummary = { sessionOpen: this.isSessionOpen(now), signalsSent: 0, outcomesApplied: 0, skippedPairs: [] };
    if (!summary.sessionOpen) {
      logger.debug('Session closed, signal scan skipped');
      return summary;
    }

    // Sized once per cycle from the balance at scan start
    const risk = this.ledger.positionRisk();
    const { account, market, branding } = this.config;

    for (const pair of market.pairs) {
      const candles = await this.fetchCandles(pair, this.strategy.requiredHistorySize);
      if (!candles) {
        summary.skippedPairs.push(pair);
        continue;
      }

      const signal = this.strategy.analyze({
        pair,
        interval: market.interval,
        candles,
        riskRewardRatio: account.riskRewardRatio,
      });
      if (!signal) {
        summary.skippedPairs.push(pair);
        continue;
      }

      logger.info(
        { pair, strategy: this.strategy.id, direction: signal.direction, entry: signal.entry },
        'Signal generated'
      );
      await this.transport.send(
        generateSignalTemplate({
          botName: branding.botName,
          signal,
          signalId: this.signalId(pair, now),
          risk,
          lotSize: account.lotSize,
          timestamp: this.timestamp(now),
          timezone: market.timezone,
        })
      );
      summary.signalsSent += 1;

      if (account.simulateOutcomes) {
        const won = this.random() > DEMO_WIN_THRESHOLD;
        const balance = this.ledger.applyOutcome(won, risk.riskAmount, risk.rewardAmount);
        summary.outcomesApplied += 1;
        logger.info({ pair, won, balance }, 'Simulated outcome applied');

        await this.transport.send(
          generateOutcomeTemplate({
            botName: branding.botName,
            signal,
            won,
            amount: won ? risk.rewardAmount : risk.riskAmount,
            balance,
          })
        );
      }
    }

    return summary;
  }

  async runHeartbeat(): Promise<boolean> {
    const now = this.clock();
    const pulses: PairPulse[] = [];

    for (const pair of this.config.market.pairs) {
      const candles = await this.fetchCandles(pair, 1);
      pulses.push({ pair, lastClose: candles ? candles[0].close : null });
    }

    return this.transport.send(
      generateHeartbeatTemplate(this.botName, pulses, this.timestamp(now), this.calendar.timezone)
    );
  }

  async runMorningActivation(): Promise<boolean> {
    const now = this.clock();
    const { market, account, branding } = this.config;

    if (!this.isSessionOpen(now)) {
      const next = nextSessionStart(now, this.calendar);
      return this.transport.send(
        generateWeekendRestTemplate(branding.botName, next ? next.format('dddd HH:mm') : null, market.timezone)
      );
    }

    return this.transport.send(
      generateSessionOpenTemplate({
        botName: branding.botName,
        traderName: branding.traderName,
        sessionDays: describeSessionDays(market.offWeekdays),
        sessionStart: market.sessionStart,
        sessionEnd: market.sessionEnd,
        timezone: market.timezone,
        capital: this.ledger.capital,
        lotSize: account.lotSize,
        riskAmount: this.ledger.positionRisk().riskAmount,
        riskPercent: account.riskPercent,
        leverage: account.leverage,
      })
    );
  }

  /**
   * Resets the ledger on the first day of the month; any other day is a no-op.
   * Returns whether a reset happened.
   */
  async runMonthlyReset(): Promise<boolean> {
    const local = localTime(this.clock(), this.calendar.timezone);
    if (local.date() !== 1) {
      return false;
    }

    const closed = this.ledger.periodStats();
    const capital = this.ledger.reset();
    logger.info({ capital, closed }, 'Monthly ledger reset');

    await this.transport.send(generateMonthlyResetTemplate(local.format('MMMM YYYY'), closed, capital));
    return true;
  }

  async announceDeployment(): Promise<boolean> {
    const now = this.clock();
    return this.transport.send(
      generateDeploymentTemplate(this.botName, this.config.market.pairs, this.timestamp(now), this.calendar.timezone)
    );
  }

  statusSnapshot(): StatusSnapshot {
    const now = this.clock();
    const missingPairs = this.config.market.pairs.filter((pair) => this.feed.get(pair) === false);
    let feed: FeedState = 'unknown';
    if (this.feed.size > 0) {
      feed = missingPairs.length > 0 ? 'degraded' : 'active';
    }

    return {
      account: this.ledger.snapshot(),
      strategy: this.strategy.name,
      pairs: [...this.config.market.pairs],
      sessionOpen: this.isSessionOpen(now),
      simulateOutcomes: this.config.account.simulateOutcomes,
      feed,
      missingPairs,
      time: this.timestamp(now),
    };
  }

  buildStatus(): string {
    const snapshot = this.statusSnapshot();
    return generateStatusTemplate({
      botName: this.botName,
      account: snapshot.account,
      strategy: snapshot.strategy,
      riskRewardText: riskRewardText(snapshot.account.riskRewardRatio),
      lotSize: this.config.account.lotSize,
      leverage: this.config.account.leverage,
      pairs: snapshot.pairs,
      sessionOpen: snapshot.sessionOpen,
      simulateOutcomes: snapshot.simulateOutcomes,
      feed: snapshot.feed,
      missingPairs: snapshot.missingPairs,
      timestamp: snapshot.time,
      timezone: this.calendar.timezone,
    });
  }
}
