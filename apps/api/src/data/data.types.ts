import { PriceSeries } from '../indicators/indicator.types';

export const LOOKBACK_PERIODS = ['1d', '5d', '1mo', '3mo', '6mo', '1y'] as const;
export type LookbackPeriod = (typeof LOOKBACK_PERIODS)[number];

// Intraday bars are only served for a short window, so these widen the lookback to 5d
export const INTRADAY_INTERVALS = ['1m', '2m', '5m', '15m', '30m', '60m', '90m'];

export type FetchResult =
  | { status: 'ok'; series: PriceSeries }
  | { status: 'data-unavailable'; reason: string }
  | { status: 'transport-fault'; message: string };

export interface MarketDataSource {
  fetchSeries(symbol: string, lookbackPeriod: string, sampleInterval: string): Promise<FetchResult>;
}

export const MARKET_DATA_SOURCE = Symbol('MARKET_DATA_SOURCE');

export function resolveLookback(period: string, interval: string): string {
  return INTRADAY_INTERVALS.includes(interval) ? '5d' : period;
}
