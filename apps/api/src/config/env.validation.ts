import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { INTRADAY_INTERVALS, LOOKBACK_PERIODS } from '../data/data.types';

const SAMPLE_INTERVALS = [...INTRADAY_INTERVALS, '1h', '1d'];

class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  PORT?: number;

  @IsOptional()
  @IsString()
  @MinLength(1)
  STOCK_MONITOR_PASSWORD?: string;

  @IsOptional()
  @IsInt()
  @Min(4)
  @Max(31)
  BCRYPT_ROUNDS?: number;

  @IsOptional()
  @IsString()
  @Matches(/^[A-Za-z0-9.\-^=]{1,12}$/, { message: 'MONITOR_DEFAULT_TICKER must be a ticker symbol' })
  MONITOR_DEFAULT_TICKER?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  MONITOR_REFRESH_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(10)
  MONITOR_TICK_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MA_SHORT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MA_MEDIUM?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  MA_LONG?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RSI_PERIOD?: number;

  @IsOptional()
  @IsNumber()
  RSI_OVERBOUGHT?: number;

  @IsOptional()
  @IsNumber()
  RSI_OVERSOLD?: number;

  @IsOptional()
  @IsNumber()
  RSI_MIDPOINT?: number;

  @IsOptional()
  @IsIn(SAMPLE_INTERVALS)
  DATA_INTERVAL?: string;

  @IsOptional()
  @IsIn(LOOKBACK_PERIODS)
  DATA_PERIOD?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DATA_RETENTION?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  FETCH_CACHE_TTL_MS?: number;
}

export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }

  return config;
}
