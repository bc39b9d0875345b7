import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PricePoint } from '../indicators/indicator.types';
import { FetchResult, MarketDataSource, resolveLookback } from './data.types';

// Upstream fields are not guaranteed; every bar is checked before use
interface PolygonAggregate {
  t?: number | null;
  c?: number | string | null;
}

interface PolygonAggsResponse {
  status?: string;
  results?: Array<PolygonAggregate | null>;
}

type PolygonSpan = { mult: number; span: 'minute' | 'hour' | 'day' };

export function toPolygonSpan(interval: string): PolygonSpan {
  if (interval === '1d') return { mult: 1, span: 'day' };
  if (interval === '1h') return { mult: 1, span: 'hour' };
  if (/^\d+m$/.test(interval)) return { mult: parseInt(interval, 10), span: 'minute' };
  throw new Error(`Unsupported interval: ${interval}`);
}

export function toDateWindow(period: string, end: Date): { from: string; to: string } {
  const start = new Date(end);

  switch (period) {
    case '1d':
      start.setUTCDate(end.getUTCDate() - 1);
      break;
    case '5d':
      start.setUTCDate(end.getUTCDate() - 5);
      break;
    case '1mo':
      start.setUTCMonth(end.getUTCMonth() - 1);
      break;
    case '3mo':
      start.setUTCMonth(end.getUTCMonth() - 3);
      break;
    case '6mo':
      start.setUTCMonth(end.getUTCMonth() - 6);
      break;
    case '1y':
      start.setUTCFullYear(end.getUTCFullYear() - 1);
      break;
    default:
      throw new Error(`Unsupported period: ${period}`);
  }

  const fmt = (d: Date) => d.toISOString().split('T')[0];
  return { from: fmt(start), to: fmt(end) };
}

@Injectable()
export class PolygonService implements MarketDataSource {
  private readonly logger = new Logger(PolygonService.name);
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('POLYGON_API_KEY', '');
    this.baseUrl = this.configService.get<string>('POLYGON_BASE_URL', 'https://api.polygon.io');
    if (!this.apiKey) {
      this.logger.warn('POLYGON_API_KEY not configured');
    }
  }

  private async fetch<T>(endpoint: string): Promise<T> {
    const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apiKey=${this.apiKey}`;
    const response = await fetch(url);

    if (!response.ok) {
      throw new Error(`Polygon API error: ${response.status} ${response.statusText}`);
    }

    return response.json() as Promise<T>;
  }

  async fetchSeries(symbol: string, lookbackPeriod: string, sampleInterval: string): Promise<FetchResult> {
    const period = resolveLookback(lookbackPeriod, sampleInterval);

    let data: PolygonAggsResponse | null;
    try {
      const { mult, span } = toPolygonSpan(sampleInterval);
      const { from, to } = toDateWindow(period, new Date());
      data = await this.fetch<PolygonAggsResponse | null>(
        `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/${mult}/${span}/${from}/${to}?adjusted=true&sort=asc&limit=50000`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Fetch failed for ${symbol}: ${message}`);
      return { status: 'transport-fault', message: `Fetch error: ${message}` };
    }

    const results = data !== null && typeof data === 'object' && Array.isArray(data.results) ? data.results : [];
    if (results.length === 0) {
      return { status: 'data-unavailable', reason: `No data for ${symbol} (${period}@${sampleInterval})` };
    }

    if (results.some((bar) => !bar || bar.c === undefined)) {
      return { status: 'data-unavailable', reason: `'Close' field missing for ${symbol}.` };
    }

    const series: PricePoint[] = [];
    for (const bar of results) {
      if (!bar || typeof bar.t !== 'number' || !Number.isFinite(bar.t)) {
        return { status: 'data-unavailable', reason: `'Timestamp' field missing for ${symbol}.` };
      }
      series.push({ timestamp: new Date(bar.t), close: bar.c === null ? NaN : Number(bar.c) });
    }

    this.logger.debug(`${symbol} ${sampleInterval} ${period} -> ${series.length} bars`);
    return { status: 'ok', series };
  }
}
