import { IndicatorConfig, IndicatorSet, Reading, UnavailableReason } from '../indicators/indicator.types';
import { MomentumLabel, MomentumStatus, TrendLabel, TrendSignal } from './signal.types';

// `missing` outranks `not-a-number` so a short history is reported as such
function firstUnavailable(readings: Reading[]): UnavailableReason | null {
  if (readings.some((r) => r.kind === 'missing')) return 'missing';
  if (readings.some((r) => r.kind === 'not-a-number')) return 'not-a-number';
  return null;
}

export function classifyTrend(latest: IndicatorSet): TrendSignal {
  const { shortMa, mediumMa, longMa } = latest;
  if (shortMa.kind !== 'value' || mediumMa.kind !== 'value' || longMa.kind !== 'value') {
    const reason = firstUnavailable([shortMa, mediumMa, longMa]) ?? 'missing';
    return { label: TrendLabel.UNAVAILABLE, reason };
  }

  const s = shortMa.value;
  const m = mediumMa.value;
  const l = longMa.value;

  if (s > m && m > l) return { label: TrendLabel.BUY };
  if (s < m && m < l) return { label: TrendLabel.SELL };
  return { label: TrendLabel.HOLD };
}

/**
 * First match wins: overbought, oversold, then the side of the midpoint.
 * Comparisons are strict, so a reading sitting on a threshold falls through.
 */
export function classifyMomentum(latest: IndicatorSet, config: IndicatorConfig): MomentumStatus {
  const { rsi } = latest;
  if (rsi.kind !== 'value') {
    return { label: MomentumLabel.UNAVAILABLE, reason: rsi.kind, value: undefined };
  }

  const v = rsi.value;
  if (v > config.overbought) return { label: MomentumLabel.OVERBOUGHT, value: v };
  if (v < config.oversold) return { label: MomentumLabel.OVERSOLD, value: v };
  if (v > config.midpoint) return { label: MomentumLabel.BULLISH, value: v };
  if (v < config.midpoint) return { label: MomentumLabel.BEARISH, value: v };
  return { label: MomentumLabel.NEUTRAL, value: v };
}
