import { describe, it, expect } from 'vitest';
import { Signal } from '../src/modules/signals/signal.types';
import { generateOutcomeTemplate, generateSignalTemplate } from '../src/notifications/templates/signal.template';
import { generateHeartbeatTemplate } from '../src/notifications/templates/heartbeat.template';
import {
  generateMonthlyResetTemplate,
  generateSessionOpenTemplate,
  generateWeekendRestTemplate,
} from '../src/notifications/templates/session.template';
import { money, signedMoney } from '../src/notifications/templates/format';

const longSignal: Signal = {
  pair: 'EUR/USD',
  interval: '1h',
  direction: 'LONG',
  entry: 1.1,
  stopLoss: 1.099,
  takeProfit: 1.102,
  volatilityProxy: 0.001,
  riskRewardRatio: 2,
  riskRewardText: '2:1',
  emaFast: 1.0995,
  emaSlow: 1.098,
  candleTime: Date.UTC(2026, 9, 19, 13),
};

describe('signal templates', () => {
  it('renders a LONG signal', () => {
    const text = generateSignalTemplate({
      botName: 'FX PULSE',
      signal: longSignal,
      signalId: 'EURUSD|1h|10191400',
      risk: { riskAmount: 20, rewardAmount: 40 },
      lotSize: 0.1,
      timestamp: '2026-10-19 14:00',
      timezone: 'Asia/Dhaka',
    });

    expect(text).toBe(
      [
        '📡 [FX PULSE SIGNAL] EUR/USD 1h',
        '🚀 BUY | Bullish trend confirmed',
        '💹 Entry: 1.10000',
        '🛑 SL: 1.09900 | 🎯 TP: 1.10200 (RR 2:1)',
        '⚙️ Indicators: EMA20 1.09950 / EMA50 1.09800 | ATR≈0.0010',
        '🕒 2026-10-19 14:00 (Asia/Dhaka)',
        '📦 Lot: 0.10 | 💰 Risk: $20.00 | Reward: $40.00',
        '━━━━━━━━━━━━━━━━━━━━━━━',
        '🚦 Status: Awaiting movement...',
        '🆔 EURUSD|1h|10191400',
      ].join('\n')
    );
  });

  it('uses the SELL headline for SHORT', () => {
    const text = generateSignalTemplate({
      botName: 'FX PULSE',
      signal: { ...longSignal, direction: 'SHORT', stopLoss: 1.101, takeProfit: 1.098 },
      signalId: 'EURUSD|1h|10191400',
      risk: { riskAmount: 20, rewardAmount: 40 },
      lotSize: 0.1,
      timestamp: '2026-10-19 14:00',
      timezone: 'UTC',
    });

    expect(text.split('\n')[1]).toBe('📉 SELL | Bearish trend confirmed');
    expect(text.split('\n')[3]).toBe('🛑 SL: 1.10100 | 🎯 TP: 1.09800 (RR 2:1)');
  });

  it('renders a win with pips to target', () => {
    expect(
      generateOutcomeTemplate({ botName: 'FX PULSE', signal: longSignal, won: true, amount: 40, balance: 1040 })
    ).toBe(
      [
        '🏆 [FX PULSE RESULT] EUR/USD 1h',
        '✅ WIN! 🎯 TP hit at 1.10200',
        '📈 +20.0 pips | 💰 +$40.00',
        '📊 New Balance: $1040.00 🏦',
      ].join('\n')
    );
  });

  it('renders a loss with pips to stop', () => {
    expect(
      generateOutcomeTemplate({ botName: 'FX PULSE', signal: longSignal, won: false, amount: 20, balance: 980 })
    ).toBe(
      [
        '💥 [FX PULSE RESULT] EUR/USD 1h',
        '❌ LOSS: SL hit at 1.09900',
        '📉 -10.0 pips | 💸 -$20.00',
        '📊 Updated Balance: $980.00 🏦',
      ].join('\n')
    );
  });

  it('counts JPY pips in hundredths', () => {
    const text = generateOutcomeTemplate({
      botName: 'FX PULSE',
      signal: { ...longSignal, pair: 'USD/JPY', entry: 150, stopLoss: 149.9, takeProfit: 150.2 },
      won: true,
      amount: 40,
      balance: 1040,
    });

    expect(text.split('\n')[2]).toBe('📈 +20.0 pips | 💰 +$40.00');
  });
});

describe('generateHeartbeatTemplate', () => {
  it('lists last closes and missing pairs', () => {
    const text = generateHeartbeatTemplate(
      'FX PULSE',
      [
        { pair: 'EUR/USD', lastClose: 1.1 },
        { pair: 'GBP/USD', lastClose: null },
      ],
      '2026-10-19 14:00',
      'UTC'
    );

    expect(text).toBe(
      [
        '❤️‍🔥 [FX PULSE HEARTBEAT]',
        '✅ EUR/USD | Last Close: 1.10000',
        '🔴 GBP/USD | Candle Missing (fetch error)',
        '',
        '🕒 2026-10-19 14:00 (UTC)',
      ].join('\n')
    );
  });
});

describe('session templates', () => {
  it('renders the session-open greeting from live values', () => {
    const text = generateSessionOpenTemplate({
      botName: 'FX PULSE',
      traderName: 'Sam',
      sessionDays: 'Monday–Thursday',
      sessionStart: '10:00',
      sessionEnd: '22:00',
      timezone: 'Asia/Dhaka',
      capital: 1040,
      lotSize: 0.1,
      riskAmount: 20.8,
      riskPercent: 2,
      leverage: 100,
    });

    expect(text).toBe(
      [
        '🌅 Good morning, Sam!',
        '🕊️ FX PULSE is scanning the forex skies for fresh entries ☁️💹',
        '⚙️ Session Active: Monday–Thursday | 10:00–22:00 (Asia/Dhaka)',
        '💵 Capital: $1040.00 | Lot: 0.10 | Risk: $20.80 (2%) | Leverage: 1:100',
        '📊 Mode: Fixed Risk + Real Balance Tracking',
      ].join('\n')
    );
  });

  it('names the next session in the weekend message', () => {
    expect(generateWeekendRestTemplate('FX PULSE', 'Monday 10:00', 'Asia/Dhaka').split('\n')[2]).toBe(
      '📅 Next Active Session: Monday 10:00 (Asia/Dhaka)'
    );
    expect(generateWeekendRestTemplate('FX PULSE', null, 'Asia/Dhaka').split('\n')[2]).toBe(
      '📅 Next Active Session: not scheduled'
    );
  });

  it('reports the closed period on reset', () => {
    expect(generateMonthlyResetTemplate('November 2026', { wins: 3, losses: 1, netProfit: 100 }, 1000)).toBe(
      [
        '🔁 Monthly Auto-Reset Complete!',
        '📅 New Month: November 2026',
        '📊 Previous Stats:',
        'Wins: 3 | Losses: 1 | Profit: +$100.00 | Accuracy: 75%',
        '💵 New Starting Capital: $1000.00',
        '⚙️ Mode: Fixed Risk + Real Balance Tracking',
        '🧭 Fresh cycle ready 💹',
      ].join('\n')
    );
  });

  it('has no accuracy without trades', () => {
    const text = generateMonthlyResetTemplate('November 2026', { wins: 0, losses: 0, netProfit: 0 }, 1000);
    expect(text.split('\n')[3]).toBe('Wins: 0 | Losses: 0 | Profit: +$0.00 | Accuracy: n/a');
  });
});

describe('money', () => {
  it('puts the sign before the currency', () => {
    expect(money(1040)).toBe('$1040.00');
    expect(money(-500)).toBe('-$500.00');
    expect(signedMoney(12.5)).toBe('+$12.50');
    expect(signedMoney(-20)).toBe('-$20.00');
  });
});
