import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AccessGateService } from '../auth/access-gate.service';
import { MonitorConfig } from '../config/configuration';
import { FetchResult, MARKET_DATA_SOURCE, MarketDataSource } from '../data/data.types';
import { FETCH_CACHE, FetchCache, fetchCacheKey } from '../data/fetch-cache';
import { DISPLAY_PUBLISHER, DisplayPublisher } from '../display/display.types';
import { computeIndicators } from '../indicators/indicator-engine';
import { PriceSeries } from '../indicators/indicator.types';
import { CycleOutcome, FormatContext, formatView } from '../presentation/formatter';
import { MonitorView, PriceDirection } from '../presentation/view-model.types';
import { classifyMomentum, classifyTrend } from '../signals/signal-classifier';
import { initialRefreshState, RefreshState, TickOutcome } from './monitor.types';

export const TICK_INTERVAL_NAME = 'monitor-tick';

export function lastFiniteClose(series: PriceSeries): number | null {
  for (let i = series.length - 1; i >= 0; i--) {
    if (Number.isFinite(series[i].close)) return series[i].close;
  }
  return null;
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

export function priceDirection(current: number | null, previous: number | null): PriceDirection {
  if (current === null || previous === null) return 'none';
  if (current > previous) return 'up';
  if (current < previous) return 'down';
  return 'flat';
}

@Injectable()
export class MonitorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MonitorService.name);
  private readonly config: MonitorConfig;
  private state: RefreshState;
  private inFlight = false;

  constructor(
    configService: ConfigService,
    @Inject(MARKET_DATA_SOURCE) private readonly source: MarketDataSource,
    @Inject(FETCH_CACHE) private readonly cache: FetchCache,
    @Inject(DISPLAY_PUBLISHER) private readonly publisher: DisplayPublisher,
    private readonly gate: AccessGateService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {
    this.config = configService.getOrThrow<MonitorConfig>('monitor');
    this.state = initialRefreshState(this.config.defaultTicker);
  }

  onModuleInit() {
    const handle = setInterval(() => {
      this.tick().catch((error: Error) => {
        this.logger.error(`Tick failed: ${error.message}`, error.stack);
      });
    }, this.config.tickIntervalMs);
    this.schedulerRegistry.addInterval(TICK_INTERVAL_NAME, handle);
    this.logger.log(
      `Monitor loop scheduled every ${this.config.tickIntervalMs}ms (refresh ${this.config.refreshIntervalMs}ms) for ${this.state.ticker}`,
    );
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', TICK_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(TICK_INTERVAL_NAME);
    }
  }

  snapshot(): Readonly<RefreshState> {
    return { ...this.state };
  }

  get settings(): MonitorConfig {
    return this.config;
  }

  settingsCaption(): string[] {
    const { indicators, sampleInterval, refreshIntervalMs } = this.config;
    return [
      `MA: ${indicators.shortWindow}/${indicators.mediumWindow}/${indicators.longWindow}`,
      `RSI: ${indicators.rsiWindow} (${indicators.oversold}/${indicators.overbought})`,
      `Data: ${sampleInterval} | Refresh: ${refreshIntervalMs / 1000}s`,
    ];
  }

  isDue(now: Date): boolean {
    if (this.state.phase !== 'steady' || this.state.lastRefreshAt === null) return true;
    return now.getTime() - this.state.lastRefreshAt.getTime() >= this.config.refreshIntervalMs;
  }

  changeTicker(raw: string): Readonly<RefreshState> {
    const symbol = raw.trim().toUpperCase();
    if (!symbol || symbol === this.state.ticker) {
      return this.snapshot();
    }

    this.logger.log(`Ticker changed ${this.state.ticker} -> ${symbol}`);
    this.state = { ...this.state, ticker: symbol, phase: 'reset', lastClose: null };
    return this.snapshot();
  }

  async tick(now: Date = new Date()): Promise<TickOutcome> {
    if (!this.gate.isGranted()) return 'gate-closed';
    if (this.inFlight) return 'busy';
    if (!this.isDue(now)) return 'not-due';

    this.inFlight = true;
    try {
      return await this.runCycle(now);
    } finally {
      this.inFlight = false;
    }
  }

  private async runCycle(now: Date): Promise<TickOutcome> {
    const ticker = this.state.ticker;
    const { outcome, observedClose } = await this.evaluate(ticker, now);

    if (this.state.ticker !== ticker) {
      this.logger.debug(`Dropping ${ticker} cycle, ticker is now ${this.state.ticker}`);
      return 'superseded';
    }

    const cycle = this.state.cycleCount + 1;
    const context: FormatContext = {
      ticker,
      now,
      cycle,
      priceDirection: priceDirection(observedClose, this.state.lastClose),
    };

    let view: MonitorView;
    let recordedClose = observedClose;
    try {
      view = formatView(outcome, context);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Formatting ${ticker} cycle failed: ${err.message}`, err.stack);
      view = formatView({ kind: 'internal-error', message: err.message }, context);
      recordedClose = null;
    }

    try {
      this.publisher.publish(view);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Publishing ${ticker} view failed: ${err.message}`, err.stack);
    }

    // A failed cycle still counts as a refresh
    this.state = {
      ...this.state,
      phase: 'steady',
      lastRefreshAt: now,
      lastClose: recordedClose ?? this.state.lastClose,
      cycleCount: cycle,
    };
    return 'cycled';
  }

  private async evaluate(
    ticker: string,
    now: Date,
  ): Promise<{ outcome: CycleOutcome; observedClose: number | null }> {
    try {
      const fetched = await this.fetchSeries(ticker, now);
      if (fetched.status !== 'ok') {
        this.logger.warn(
          `${ticker}: ${fetched.status === 'data-unavailable' ? fetched.reason : fetched.message}`,
        );
        return { outcome: { kind: 'fetch-failed', failure: fetched }, observedClose: null };
      }

      const series = fetched.series.slice(-this.config.retention);
      const observedClose = lastFiniteClose(series);
      const result = computeIndicators(series, this.config.indicators);
      if (result.status !== 'ok') {
        this.logger.debug(`${ticker}: indicators unavailable (${result.status})`);
        return { outcome: { kind: 'indicators-failed', failure: result }, observedClose };
      }

      return {
        outcome: {
          kind: 'classified',
          latest: result.latest,
          trend: classifyTrend(result.latest),
          momentum: classifyMomentum(result.latest, this.config.indicators),
        },
        observedClose,
      };
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Cycle for ${ticker} failed: ${err.message}`, err.stack);
      return { outcome: { kind: 'internal-error', message: err.message }, observedClose: null };
    }
  }

  private async fetchSeries(ticker: string, now: Date): Promise<FetchResult> {
    const { lookbackPeriod, sampleInterval } = this.config;
    const key = fetchCacheKey(ticker, lookbackPeriod, sampleInterval);

    const cached = this.cache.get(key, now.getTime());
    if (cached) return cached;

    let result: FetchResult;
    try {
      result = await this.source.fetchSeries(ticker, lookbackPeriod, sampleInterval);
    } catch (error) {
      result = { status: 'transport-fault', message: `Fetch error: ${toError(error).message}` };
    }
    this.cache.set(key, result, now.getTime());
    return result;
  }
}
