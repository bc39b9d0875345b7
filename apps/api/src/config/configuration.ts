// Typed monitor configuration, consumed through ConfigModule.load
import { DEFAULT_INDICATOR_CONFIG, IndicatorConfig } from '../indicators/indicator.types';
import { assertIndicatorConfig } from './indicator-config.validator';

export interface MonitorConfig {
  indicators: IndicatorConfig;
  defaultTicker: string;
  refreshIntervalMs: number;
  tickIntervalMs: number; // how often the scheduler wakes up; cycles still respect refreshIntervalMs
  lookbackPeriod: string;
  sampleInterval: string;
  retention: number;
  fetchCacheTtlMs: number;
}

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  indicators: DEFAULT_INDICATOR_CONFIG,
  defaultTicker: 'AAPL',
  refreshIntervalMs: 1000,
  tickIntervalMs: 100,
  lookbackPeriod: '1d',
  sampleInterval: '1m',
  retention: 150,
  fetchCacheTtlMs: 900,
};

type Env = Record<string, string | undefined>;

const num = (raw: string | undefined, fallback: number): number =>
  raw === undefined || raw.trim() === '' ? fallback : Number(raw);

export function buildMonitorConfig(env: Env): MonitorConfig {
  const d = DEFAULT_MONITOR_CONFIG;
  const indicators = assertIndicatorConfig({
    shortWindow: num(env.MA_SHORT, d.indicators.shortWindow),
    mediumWindow: num(env.MA_MEDIUM, d.indicators.mediumWindow),
    longWindow: num(env.MA_LONG, d.indicators.longWindow),
    rsiWindow: num(env.RSI_PERIOD, d.indicators.rsiWindow),
    overbought: num(env.RSI_OVERBOUGHT, d.indicators.overbought),
    oversold: num(env.RSI_OVERSOLD, d.indicators.oversold),
    midpoint: num(env.RSI_MIDPOINT, d.indicators.midpoint),
  });

  return {
    indicators,
    defaultTicker: (env.MONITOR_DEFAULT_TICKER ?? d.defaultTicker).trim().toUpperCase(),
    refreshIntervalMs: num(env.MONITOR_REFRESH_MS, d.refreshIntervalMs),
    tickIntervalMs: num(env.MONITOR_TICK_MS, d.tickIntervalMs),
    lookbackPeriod: env.DATA_PERIOD ?? d.lookbackPeriod,
    sampleInterval: env.DATA_INTERVAL ?? d.sampleInterval,
    retention: num(env.DATA_RETENTION, d.retention),
    fetchCacheTtlMs: num(env.FETCH_CACHE_TTL_MS, d.fetchCacheTtlMs),
  };
}

export default () => ({
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: parseInt(process.env.PORT ?? '3667', 10),
  monitor: buildMonitorConfig(process.env),
});
