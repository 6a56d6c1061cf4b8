import axios, { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { Candle, CandleSeries } from '../src/modules/market/market.types';
import { MessagingTransport } from '../src/notifications/telegram.service';

const HOUR = 60 * 60 * 1000;
export const SERIES_END = Date.UTC(2026, 9, 19, 13, 0, 0);

/**
 * Builds a newest-first series from closes given oldest first. Each candle
 * spans `range` around its close.
 */
export const buildSeries = (closes: number[], range = 0.001): CandleSeries =>
  closes
    .map(
      (close, i): Candle => ({
        time: SERIES_END - (closes.length - 1 - i) * HOUR,
        open: close,
        high: close + range / 2,
        low: close - range / 2,
        close,
      })
    )
    .reverse();

export const rising = (count: number, start = 1.05, step = 0.001) =>
  Array.from({ length: count }, (_, i) => start + i * step);

export const falling = (count: number, start = 1.3, step = 0.001) =>
  Array.from({ length: count }, (_, i) => start - i * step);

export class RecordingTransport implements MessagingTransport {
  sent: string[] = [];
  result = true;

  async send(text: string): Promise<boolean> {
    this.sent.push(text);
    return this.result;
  }
}

export interface RecordedRequest {
  method: string | undefined;
  url: string | undefined;
  params: unknown;
  body: unknown;
}

/**
 * Axios instance whose adapter answers in process. `respond` returns the body
 * for a request or throws to simulate a transport failure.
 */
export const fakeHttp = (respond: (request: RecordedRequest) => unknown) => {
  const requests: RecordedRequest[] = [];
  const http: AxiosInstance = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const request: RecordedRequest = {
        method: config.method,
        url: config.url,
        params: config.params,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      };
      requests.push(request);
      const data = respond(request);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { http, requests };
};
