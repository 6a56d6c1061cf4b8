import { AddressInfo } from 'net';
import { Server } from 'http';
import axios from 'axios';
import { afterEach, describe, it, expect } from 'vitest';
import { createApp } from '../src/app';
import { loadConfig } from '../src/config/config';
import { LedgerService } from '../src/modules/account/ledger.service';
import { DispatcherService } from '../src/modules/dispatcher/dispatcher.service';
import { EmaTrendStrategy } from '../src/modules/signals/emaTrend.strategy';
import { RecordingTransport } from './helpers';

let server: Server | null = null;

const serve = async () => {
  const config = loadConfig({ TIMEZONE: 'UTC' });
  const ledger = new LedgerService({ startingCapital: 1000, riskPercent: 2, riskRewardRatio: 2 });
  const dispatcher = new DispatcherService({
    config,
    candles: { fetch: async () => null },
    strategy: EmaTrendStrategy,
    ledger,
    transport: new RecordingTransport(),
    clock: () => new Date(Date.UTC(2026, 9, 19, 14, 0)),
  });

  const listening = createApp(dispatcher).listen(0);
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));

  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('Server has no TCP address');
  return { baseURL: `http://127.0.0.1:${(address satisfies AddressInfo).port}`, ledger };
};

afterEach(async () => {
  const current = server;
  server = null;
  if (current) await new Promise<void>((resolve) => current.close(() => resolve()));
});

describe('HTTP surface', () => {
  it('answers the health check', async () => {
    const { baseURL } = await serve();

    const res = await axios.get(`${baseURL}/`, { validateStatus: () => true });

    expect(res.status).toBe(200);
    expect(res.data).toBe('OK');
  });

  it('serves the status snapshot as JSON', async () => {
    const { baseURL, ledger } = await serve();
    ledger.applyOutcome(true, 20, 40);

    const res = await axios.get(`${baseURL}/api/v1/status`, { validateStatus: () => true });

    expect(res.status).toBe(200);
    expect(res.data).toMatchObject({
      account: { currentCapital: 1040, wins: 1, losses: 0 },
      strategy: 'EMA 20/50 Trend',
      pairs: ['EUR/USD', 'GBP/USD'],
      sessionOpen: true,
      simulateOutcomes: false,
      feed: 'unknown',
      missingPairs: [],
      time: '2026-10-19 14:00',
    });
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const { baseURL } = await serve();

    const res = await axios.get(`${baseURL}/api/v1/signals`, { validateStatus: () => true });

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ code: 404, message: 'Not found' });
  });
});
