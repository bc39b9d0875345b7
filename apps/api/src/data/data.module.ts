import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MonitorConfig } from '../config/configuration';
import { PolygonService } from './polygon.service';
import { MARKET_DATA_SOURCE } from './data.types';
import { FETCH_CACHE, TtlFetchCache } from './fetch-cache';

@Module({
  providers: [
    PolygonService,
    { provide: MARKET_DATA_SOURCE, useExisting: PolygonService },
    {
      provide: FETCH_CACHE,
      useFactory: (config: ConfigService) =>
        new TtlFetchCache(config.getOrThrow<MonitorConfig>('monitor').fetchCacheTtlMs),
      inject: [ConfigService],
    },
  ],
  exports: [MARKET_DATA_SOURCE, FETCH_CACHE],
})
export class DataModule {}
