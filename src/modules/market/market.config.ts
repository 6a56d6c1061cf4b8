// src/modules/market/market.config.ts
export const MIN_SIGNAL_CANDLES = 60;

export const TWELVEDATA_REST_URL = 'https://api.twelvedata.com';

// "EUR/USD" -> "EURUSD=X"
export const toYahooSymbol = (pair: string): string => `${pair.replace('/', '')}=X`;

// "EUR/USD" -> "EURUSD"
export const compactPair = (pair: string): string => pair.replace('/', '');

export const pipSize = (pair: string): number => (pair.endsWith('/JPY') ? 0.01 : 0.0001);
