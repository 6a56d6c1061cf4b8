import http from 'http';
import { createApp } from './app';
import { config } from './config/config';
import logger from './common/utils/logger';
import { LedgerService } from './modules/account/ledger.service';
import { CommandListener } from './modules/commands/commandListener';
import { DispatcherService } from './modules/dispatcher/dispatcher.service';
import { CandleService } from './modules/market/candle.service';
import { TwelveDataProvider } from './modules/market/twelveData.provider';
import { YahooProvider } from './modules/market/yahoo.provider';
import { EmaTrendStrategy } from './modules/signals/emaTrend.strategy';
import { TelegramService } from './notifications/telegram.service';
import { startSchedulerWorker } from './workers/scheduler.worker';

const startServer = async () => {
  try {
    const ledger = new LedgerService({
      startingCapital: config.account.startingCapital,
      riskPercent: config.account.riskPercent,
      riskRewardRatio: config.account.riskRewardRatio,
    });

    const telegram = new TelegramService({
      token: config.telegram.token,
      chatId: config.telegram.chatId,
      timeoutMs: config.http.timeoutMs,
    });

    // Order matters: TwelveData first when a key is set, Yahoo as the keyless fallback
    const candleService = new CandleService([
      new TwelveDataProvider({
        apiKey: config.twelvedata.apiKey,
        outputSize: config.twelvedata.outputSize,
        timeoutMs: config.http.timeoutMs,
      }),
      new YahooProvider({ lookbackDays: config.yahoo.lookbackDays, timeoutMs: config.http.timeoutMs }),
    ]);

    const dispatcher = new DispatcherService({
      config,
      candles: candleService,
      strategy: EmaTrendStrategy,
      ledger,
      transport: telegram,
    });

    const listener = new CommandListener(telegram, { status: () => dispatcher.buildStatus() });
    if (telegram.isConfigured()) {
      listener.start();
    } else {
      logger.warn('TELEGRAM_TOKEN not set: messages are dropped and /status is not served');
    }

    const scheduler = startSchedulerWorker(dispatcher, config);

    const server = http.createServer(createApp(dispatcher));
    server.listen(config.port, () => {
      logger.info(`Server is running on port ${config.port}`);
    });

    await dispatcher.announceDeployment();

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      scheduler.stop();
      server.close();
      // Do not wait for the in-flight long poll
      listener.stop().catch((error) => logger.error({ err: error }, 'Command listener stop failed'));
      process.exit(0);
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ err: error }, 'Failed to start the server');
    process.exit(1);
  }
};

startServer().catch((error) => {
  logger.error({ err: error }, 'Unexpected startup failure');
  process.exit(1);
});
