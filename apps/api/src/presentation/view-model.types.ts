import { UnavailableReason } from '../indicators/indicator.types';

export type Tone =
  | 'default'
  | 'muted'
  | 'positive'
  | 'negative'
  | 'warning'
  | 'extreme'
  | 'bullish'
  | 'bearish';

export interface Segment {
  text: string;
  tone: Tone;
  strong: boolean;
  small: boolean;
  reason?: UnavailableReason; // set when an indicator reading was unavailable
}

export type PriceDirection = 'up' | 'down' | 'flat' | 'none';

export type ViewStatus =
  | 'ok'
  | 'data-unavailable'
  | 'transport-fault'
  | 'empty'
  | 'insufficient-history'
  | 'no-usable-data'
  | 'internal-error';

export interface PriceLine {
  close: string;
  candleTime: string;
  movingAverages: [string, string, string];
}

export interface MonitorView {
  generatedAt: string;
  clock: string;
  ticker: string;
  cycle: number;
  status: ViewStatus;
  price: PriceLine | null;
  priceError: string | null;
  trend: Segment;
  momentum: Segment;
  priceDirection: PriceDirection;
}
