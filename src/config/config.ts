import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';
const envPath = path.resolve(process.cwd(), `.env.${nodeEnv}`);

dotenv.config({ path: envPath });

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

const csv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TELEGRAM_TOKEN: z.string().default(''),
  CHAT_ID: z.string().default(''),
  BOT_NAME: z.string().default('FX PULSE'),
  TRADER_NAME: z.string().default('Trader'),
  TIMEZONE: z.string().default('Asia/Dhaka'),
  PAIRS: csv('EUR/USD,GBP/USD').pipe(z.array(z.string().regex(/^[A-Z]{3}\/[A-Z]{3}$/)).min(1)),
  OFF_WEEKDAYS: csv('5,6,7').pipe(z.array(z.coerce.number().int().min(1).max(7))),
  SESSION_START: clockTime.default('10:00'),
  SESSION_END: clockTime.default('22:00'),
  MORNING_TIME: clockTime.default('10:00'),
  RESET_CHECK_TIME: clockTime.default('10:10'),
  HEARTBEAT_MINUTES: z.coerce.number().int().positive().default(40),
  SCHEDULER_POLL_MS: z.coerce.number().int().positive().default(5000),
  START_CAPITAL: z.coerce.number().default(1000),
  RISK_PERCENT: z.coerce.number().default(2),
  RR: z.coerce.number().positive().default(2),
  LOT_SIZE: z.coerce.number().positive().default(0.1),
  LEVERAGE: z.coerce.number().int().positive().default(100),
  DEMO_RESULT: z.enum(['0', '1']).default('0'),
  TWELVEDATA_API_KEY: z.string().trim().default(''),
  CANDLE_OUTPUT_SIZE: z.coerce.number().int().positive().default(120),
  YAHOO_LOOKBACK_DAYS: z.coerce.number().int().min(2).default(5),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(12000),
});

export const loadConfig = (source: Record<string, string | undefined>) => {
  const env = envSchema.parse(source);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    telegram: {
      token: env.TELEGRAM_TOKEN,
      chatId: env.CHAT_ID,
    },
    branding: {
      botName: env.BOT_NAME,
      traderName: env.TRADER_NAME,
    },
    market: {
      pairs: env.PAIRS,
      interval: '1h' as const,
      timezone: env.TIMEZONE,
      offWeekdays: env.OFF_WEEKDAYS,
      sessionStart: env.SESSION_START,
      sessionEnd: env.SESSION_END,
    },
    schedule: {
      morningTime: env.MORNING_TIME,
      resetCheckTime: env.RESET_CHECK_TIME,
      heartbeatMinutes: env.HEARTBEAT_MINUTES,
      pollMs: env.SCHEDULER_POLL_MS,
    },
    account: {
      startingCapital: env.START_CAPITAL,
      riskPercent: env.RISK_PERCENT,
      riskRewardRatio: env.RR,
      lotSize: env.LOT_SIZE,
      leverage: env.LEVERAGE,
      simulateOutcomes: env.DEMO_RESULT === '1',
    },
    twelvedata: {
      apiKey: env.TWELVEDATA_API_KEY,
      outputSize: env.CANDLE_OUTPUT_SIZE,
    },
    yahoo: {
      lookbackDays: env.YAHOO_LOOKBACK_DAYS,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig(process.env);
