import { DEFAULT_INDICATOR_CONFIG, IndicatorSet, Reading } from '../indicators/indicator.types';
import { classifyMomentum, classifyTrend } from './signal-classifier';
import { MomentumLabel, TrendLabel } from './signal.types';

const v = (value: number): Reading => ({ kind: 'value', value });

const set = (overrides: Partial<IndicatorSet>): IndicatorSet => ({
  shortMa: overrides.shortMa ?? v(3),
  mediumMa: overrides.mediumMa ?? v(2),
  longMa: overrides.longMa ?? v(1),
  rsi: overrides.rsi ?? v(50),
});

describe('classifyTrend', () => {
  it('is BUY when short > medium > long', () => {
    expect(classifyTrend(set({ shortMa: v(117), mediumMa: v(115.5), longMa: v(113) }))).toEqual({
      label: TrendLabel.BUY,
    });
  });

  it('is SELL when short < medium < long', () => {
    expect(classifyTrend(set({ shortMa: v(1), mediumMa: v(2), longMa: v(3) }))).toEqual({
      label: TrendLabel.SELL,
    });
  });

  it('is HOLD when only the short side is above', () => {
    expect(classifyTrend(set({ shortMa: v(5), mediumMa: v(4), longMa: v(4) }))).toEqual({
      label: TrendLabel.HOLD,
    });
  });

  it('partitions every ordering of three averages', () => {
    const levels = [1, 2, 3];
    for (const s of levels) {
      for (const m of levels) {
        for (const l of levels) {
          const { label } = classifyTrend(set({ shortMa: v(s), mediumMa: v(m), longMa: v(l) }));
          const expected = s > m && m > l ? TrendLabel.BUY : s < m && m < l ? TrendLabel.SELL : TrendLabel.HOLD;
          expect(label).toBe(expected);
        }
      }
    }
  });

  it('separates missing from not-a-number', () => {
    expect(classifyTrend(set({ longMa: { kind: 'missing' } }))).toEqual({
      label: TrendLabel.UNAVAILABLE,
      reason: 'missing',
    });
    expect(classifyTrend(set({ mediumMa: { kind: 'not-a-number' } }))).toEqual({
      label: TrendLabel.UNAVAILABLE,
      reason: 'not-a-number',
    });
  });

  it('reports missing when both kinds are present', () => {
    const trend = classifyTrend(set({ shortMa: { kind: 'not-a-number' }, longMa: { kind: 'missing' } }));
    expect(trend).toEqual({ label: TrendLabel.UNAVAILABLE, reason: 'missing' });
  });
});

describe('classifyMomentum', () => {
  const cases: Array<[number, MomentumLabel]> = [
    [75, MomentumLabel.OVERBOUGHT],
    [25, MomentumLabel.OVERSOLD],
    [55, MomentumLabel.BULLISH],
    [45, MomentumLabel.BEARISH],
    [50, MomentumLabel.NEUTRAL],
    [70, MomentumLabel.BULLISH],
    [30, MomentumLabel.BEARISH],
  ];

  it.each(cases)('classifies %p as %s', (rsi, label) => {
    expect(classifyMomentum(set({ rsi: v(rsi) }), DEFAULT_INDICATOR_CONFIG)).toEqual({ label, value: rsi });
  });

  it('honours custom thresholds', () => {
    const config = { ...DEFAULT_INDICATOR_CONFIG, overbought: 80, oversold: 20 };
    expect(classifyMomentum(set({ rsi: v(75) }), config).label).toBe(MomentumLabel.BULLISH);
  });

  it('carries the reason and no value when RSI is unavailable', () => {
    expect(classifyMomentum(set({ rsi: { kind: 'not-a-number' } }), DEFAULT_INDICATOR_CONFIG)).toEqual({
      label: MomentumLabel.UNAVAILABLE,
      reason: 'not-a-number',
      value: undefined,
    });
  });
});
