import {
  IndicatorConfig,
  IndicatorResult,
  IndicatorRow,
  MISSING,
  PriceSeries,
  Reading,
  readingOf,
} from './indicator.types';

// Extra bars on top of the longest window before any indicator is trusted
export const HISTORY_PADDING = 5;

export function minimumHistory(config: IndicatorConfig): number {
  return (
    Math.max(config.shortWindow, config.mediumWindow, config.longWindow, config.rsiWindow) +
    HISTORY_PADDING
  );
}

export function simpleMovingAverage(closes: readonly number[], window: number): Reading[] {
  return closes.map((_, i) => {
    if (i < window - 1) return MISSING;
    const slice = closes.slice(i - window + 1, i + 1);
    return readingOf(slice.reduce((sum, close) => sum + close, 0) / window);
  });
}

/**
 * Wilder RSI. The first `window` changes seed the average gain/loss as a plain
 * mean; after that each average is smoothed with weight 1/window.
 */
export function wilderRsi(closes: readonly number[], window: number): Reading[] {
  const out: Reading[] = closes.map(() => MISSING);
  if (closes.length <= window) return out;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= window; i++) {
    const change = closes[i] - closes[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= window;
  avgLoss /= window;
  out[window] = readingOf(toRsi(avgGain, avgLoss));

  for (let i = window + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (window - 1) + Math.max(change, 0)) / window;
    avgLoss = (avgLoss * (window - 1) + Math.max(-change, 0)) / window;
    out[i] = readingOf(toRsi(avgGain, avgLoss));
  }

  return out;
}

// 0/0 on a flat series stays NaN and surfaces as a not-a-number reading
function toRsi(avgGain: number, avgLoss: number): number {
  return (100 * avgGain) / (avgGain + avgLoss);
}

function isComplete(row: IndicatorRow): boolean {
  return [row.shortMa, row.mediumMa, row.longMa, row.rsi].every((r) => r.kind === 'value');
}

export function computeIndicators(series: PriceSeries, config: IndicatorConfig): IndicatorResult {
  if (series.length === 0) {
    return { status: 'empty' };
  }

  const required = minimumHistory(config);
  if (series.length < required) {
    return { status: 'insufficient-history', required, available: series.length, afterCleaning: false };
  }

  const clean = series.filter((point) => Number.isFinite(point.close));
  if (clean.length < required) {
    return { status: 'insufficient-history', required, available: clean.length, afterCleaning: true };
  }

  const closes = clean.map((point) => point.close);
  const shortMa = simpleMovingAverage(closes, config.shortWindow);
  const mediumMa = simpleMovingAverage(closes, config.mediumWindow);
  const longMa = simpleMovingAverage(closes, config.longWindow);
  const rsi = wilderRsi(closes, config.rsiWindow);

  const rows: IndicatorRow[] = clean.map((point, i) => ({
    timestamp: point.timestamp,
    close: point.close,
    shortMa: shortMa[i],
    mediumMa: mediumMa[i],
    longMa: longMa[i],
    rsi: rsi[i],
  }));

  const usable = rows.filter(isComplete);
  if (usable.length === 0) {
    return { status: 'no-usable-data', rows };
  }

  return { status: 'ok', rows: usable, latest: usable[usable.length - 1] };
}
