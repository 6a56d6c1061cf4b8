import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../../common/utils/logger';
import { TWELVEDATA_REST_URL } from './market.config';
import { CandleInterval, CandleProvider, RawCandleRow } from './market.types';

const timeSeriesSchema = z.object({
  values: z.array(
    z.object({
      datetime: z.string(),
      open: z.unknown(),
      high: z.unknown(),
      low: z.unknown(),
      close: z.unknown(),
    })
  ),
});

interface TwelveDataOptions {
  apiKey: string;
  outputSize: number;
  timeoutMs: number;
  http?: AxiosInstance;
}

export class TwelveDataProvider implements CandleProvider {
  readonly name = 'twelvedata';
  private apiKey: string;
  private outputSize: number;
  private http: AxiosInstance;

  constructor(options: TwelveDataOptions) {
    this.apiKey = options.apiKey;
    this.outputSize = options.outputSize;
    this.http = options.http ?? axios.create({ baseURL: TWELVEDATA_REST_URL, timeout: options.timeoutMs });
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async getCandles(pair: string, interval: CandleInterval, minCandles: number): Promise<RawCandleRow[] | null> {
    const res = await this.http.get('/time_series', {
      params: {
        symbol: pair,
        interval,
        outputsize: Math.max(minCandles, this.outputSize),
        apikey: this.apiKey,
      },
    });

    const parsed = timeSeriesSchema.safeParse(res.data);
    if (!parsed.success) {
      logger.warn({ pair, body: res.data }, 'TwelveData response has no usable values');
      return null;
    }

    // TwelveData datetimes are exchange-local without offset; read them as UTC
    return parsed.data.values.map((row) => ({
      time: Date.parse(`${row.datetime.replace(' ', 'T')}Z`),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
    }));
  }
}
