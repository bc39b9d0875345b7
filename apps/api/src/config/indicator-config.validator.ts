import { IndicatorConfig } from '../indicators/indicator.types';

/**
 * Collects every broken invariant of an indicator config. The trend rule
 * assumes short < medium < long, and the momentum rule checks overbought
 * before oversold, so a config with the thresholds inverted is rejected
 * instead of being silently misclassified.
 */
export function indicatorConfigProblems(config: IndicatorConfig): string[] {
  const problems: string[] = [];

  const windows: Array<[string, number]> = [
    ['shortWindow', config.shortWindow],
    ['mediumWindow', config.mediumWindow],
    ['longWindow', config.longWindow],
    ['rsiWindow', config.rsiWindow],
  ];
  for (const [name, length] of windows) {
    if (!Number.isInteger(length) || length < 1) {
      problems.push(`${name} must be an integer >= 1 (got ${length})`);
    }
  }

  if (!(config.shortWindow < config.mediumWindow && config.mediumWindow < config.longWindow)) {
    problems.push(
      `moving average windows must satisfy short < medium < long (got ${config.shortWindow}/${config.mediumWindow}/${config.longWindow})`,
    );
  }

  if (!(config.oversold < config.midpoint && config.midpoint < config.overbought)) {
    problems.push(
      `RSI thresholds must satisfy oversold < midpoint < overbought (got ${config.oversold}/${config.midpoint}/${config.overbought})`,
    );
  }

  return problems;
}

export function assertIndicatorConfig(config: IndicatorConfig): IndicatorConfig {
  const problems = indicatorConfigProblems(config);
  if (problems.length > 0) {
    throw new Error(`Invalid indicator config: ${problems.join('; ')}`);
  }
  return config;
}
