import { FetchResult } from '../data/data.types';
import { IndicatorResult, IndicatorRow, Reading } from '../indicators/indicator.types';
import { MomentumLabel, MomentumStatus, TrendLabel, TrendSignal } from '../signals/signal.types';
import { MonitorView, PriceDirection, PriceLine, Segment, ViewStatus } from './view-model.types';

export type FetchFailure = Exclude<FetchResult, { status: 'ok' }>;
export type IndicatorFailure = Exclude<IndicatorResult, { status: 'ok' }>;

export type CycleOutcome =
  | { kind: 'fetch-failed'; failure: FetchFailure }
  | { kind: 'indicators-failed'; failure: IndicatorFailure }
  | { kind: 'classified'; latest: IndicatorRow; trend: TrendSignal; momentum: MomentumStatus }
  | { kind: 'internal-error'; message: string };

export interface FormatContext {
  ticker: string;
  now: Date;
  cycle: number;
  priceDirection: PriceDirection;
}

// Times are rendered in UTC, matching the timezone-naive bar timestamps
export const clockTime = (d: Date): string => d.toISOString().slice(11, 19);

const fixed2 = (r: Reading): string => (r.kind === 'value' ? r.value.toFixed(2) : 'N/A');

const warning = (text: string): Segment => ({ text, tone: 'warning', strong: false, small: true });

export function indicatorFailureLabel(failure: IndicatorFailure): string {
  switch (failure.status) {
    case 'empty':
      return 'DATA_EMPTY';
    case 'insufficient-history':
      return `Need ${failure.required} (Have ${failure.available}${failure.afterCleaning ? ' clean' : ''})`;
    case 'no-usable-data':
      return 'NO_DATA';
  }
}

export function trendSegment(trend: TrendSignal): Segment {
  switch (trend.label) {
    case TrendLabel.BUY:
      return { text: 'MA: >> BUY <<', tone: 'positive', strong: true, small: false };
    case TrendLabel.SELL:
      return { text: 'MA: << SELL >>', tone: 'negative', strong: true, small: false };
    case TrendLabel.HOLD:
      return { text: 'MA: HOLD', tone: 'default', strong: false, small: false };
    case TrendLabel.UNAVAILABLE:
      return { ...warning('MA: N/A'), reason: trend.reason };
  }
}

export function momentumSegment(momentum: MomentumStatus): Segment {
  if (momentum.label === MomentumLabel.UNAVAILABLE) {
    return { ...warning('RSI: N/A'), reason: momentum.reason };
  }

  const base = `RSI(${momentum.value.toFixed(2)})`;
  switch (momentum.label) {
    case MomentumLabel.OVERBOUGHT:
      return { text: `${base} OB`, tone: 'extreme', strong: true, small: false };
    case MomentumLabel.OVERSOLD:
      return { text: `${base} OS`, tone: 'extreme', strong: true, small: false };
    case MomentumLabel.BULLISH:
      return { text: `${base} Bull`, tone: 'bullish', strong: false, small: false };
    case MomentumLabel.BEARISH:
      return { text: `${base} Bear`, tone: 'bearish', strong: false, small: false };
    case MomentumLabel.NEUTRAL:
      return { text: `${base} Neut`, tone: 'default', strong: false, small: false };
  }
}

function priceLine(latest: IndicatorRow): PriceLine {
  return {
    close: latest.close.toFixed(2),
    candleTime: clockTime(latest.timestamp),
    movingAverages: [fixed2(latest.shortMa), fixed2(latest.mediumMa), fixed2(latest.longMa)],
  };
}

export function formatView(outcome: CycleOutcome, ctx: FormatContext): MonitorView {
  const base = {
    generatedAt: ctx.now.toISOString(),
    clock: clockTime(ctx.now),
    ticker: ctx.ticker,
    cycle: ctx.cycle,
    priceDirection: ctx.priceDirection,
  };

  const failed = (status: ViewStatus, detail: string, label: string): MonitorView => ({
    ...base,
    status,
    price: null,
    priceError: `Data Error: ${detail}`,
    trend: warning(`MA: ${label}`),
    momentum: warning(`RSI: ${label}`),
  });

  switch (outcome.kind) {
    case 'fetch-failed': {
      const detail =
        outcome.failure.status === 'data-unavailable' ? outcome.failure.reason : outcome.failure.message;
      return failed(outcome.failure.status, detail, 'DATA_ERR');
    }
    case 'indicators-failed': {
      const label = indicatorFailureLabel(outcome.failure);
      return failed(outcome.failure.status, label, label);
    }
    case 'internal-error':
      return failed('internal-error', outcome.message, 'INTERNAL');
    case 'classified':
      return {
        ...base,
        status: 'ok',
        price: priceLine(outcome.latest),
        priceError: null,
        trend: trendSegment(outcome.trend),
        momentum: momentumSegment(outcome.momentum),
      };
  }
}
