import { UnavailableReason } from '../indicators/indicator.types';

export enum TrendLabel {
  BUY = 'BUY',
  SELL = 'SELL',
  HOLD = 'HOLD',
  UNAVAILABLE = 'UNAVAILABLE',
}

export enum MomentumLabel {
  OVERBOUGHT = 'OVERBOUGHT',
  OVERSOLD = 'OVERSOLD',
  BULLISH = 'BULLISH',
  BEARISH = 'BEARISH',
  NEUTRAL = 'NEUTRAL',
  UNAVAILABLE = 'UNAVAILABLE',
}

export type TrendSignal =
  | { label: TrendLabel.BUY | TrendLabel.SELL | TrendLabel.HOLD }
  | { label: TrendLabel.UNAVAILABLE; reason: UnavailableReason };

export type MomentumStatus =
  | {
      label: Exclude<MomentumLabel, MomentumLabel.UNAVAILABLE>;
      value: number;
    }
  | { label: MomentumLabel.UNAVAILABLE; reason: UnavailableReason; value: undefined };
