export interface PricePoint {
  timestamp: Date;
  close: number; // NaN when the upstream value did not parse
}

export type PriceSeries = readonly PricePoint[];

/**
 * A single indicator value. `missing` means not enough history yet,
 * `not-a-number` means the math produced NaN (e.g. RSI on a flat series).
 */
export type Reading =
  | { kind: 'value'; value: number }
  | { kind: 'missing' }
  | { kind: 'not-a-number' };

export type UnavailableReason = Exclude<Reading['kind'], 'value'>;

export interface IndicatorSet {
  shortMa: Reading;
  mediumMa: Reading;
  longMa: Reading;
  rsi: Reading;
}

export interface IndicatorRow extends IndicatorSet {
  timestamp: Date;
  close: number;
}

export interface IndicatorConfig {
  shortWindow: number;
  mediumWindow: number;
  longWindow: number;
  rsiWindow: number;
  overbought: number;
  oversold: number;
  midpoint: number;
}

export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
  shortWindow: 5,
  mediumWindow: 8,
  longWindow: 13,
  rsiWindow: 14,
  overbought: 70,
  oversold: 30,
  midpoint: 50,
};

export type IndicatorResult =
  | { status: 'empty' }
  | {
      status: 'insufficient-history';
      required: number;
      available: number;
      afterCleaning: boolean; // true when the shortfall came from dropping unparseable closes
    }
  | { status: 'no-usable-data'; rows: IndicatorRow[] }
  | { status: 'ok'; rows: IndicatorRow[]; latest: IndicatorRow };

export const readingOf = (v: number): Reading =>
  Number.isNaN(v) ? { kind: 'not-a-number' } : { kind: 'value', value: v };

export const MISSING: Reading = { kind: 'missing' };
