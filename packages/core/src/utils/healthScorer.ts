/**
 * Composite health scoring.
 *
 * Pure and deterministic: identical (sample, trends, memory health, settings)
 * always produce the identical score. Nothing here reads the clock.
 */
import type { HealthScore, HealthStatus, MemoryHealth, TrendStats } from '../healthTypes.js';
import type { HealthSettings, MetricSample } from '../types.js';
import { readMetric } from './historyStore.js';
import { efficiencyOf } from './trendAnalyzer.js';

const ZERO = 0;
const ONE = 1;
const MAX_SCORE = 100;
const PERCENT = 100;

export const TEMPERATURE_WEIGHT = 0.4;
export const POWER_WEIGHT = 0.3;
export const MEMORY_WEIGHT = 0.3;

const EXCELLENT_MIN = 90;
const GOOD_MIN = 70;
const WARNING_MIN = 50;

/** Breakpoints of the shared piecewise-linear curve */
export interface CurveBreakpoints {
  baseline: number;
  warn: number;
  crit: number;
  /** Score exactly at the warn breakpoint */
  warnScore: number;
}

export const clampScore = (value: number): number => Math.min(MAX_SCORE, Math.max(ZERO, value));

const interpolate = (value: number, from: number, to: number, fromScore: number, toScore: number): number => {
  const span = to - from;
  if (span <= ZERO) return toScore;
  return fromScore + ((value - from) / span) * (toScore - fromScore);
};

/**
 * 100 at or below baseline, linear to warnScore at warn, linear to 0 at crit,
 * 0 beyond crit.
 */
export const piecewiseScore = (value: number, curve: CurveBreakpoints): number => {
  const { baseline, warn, crit, warnScore } = curve;
  if (value <= baseline) return MAX_SCORE;
  if (value <= warn) return interpolate(value, baseline, warn, MAX_SCORE, warnScore);
  if (value < crit) return interpolate(value, warn, crit, warnScore, ZERO);
  return ZERO;
};

/** Power draw as a percentage of the configured board limit */
export const powerPercent = (sample: MetricSample, powerLimitWatts: number): number =>
  powerLimitWatts > ZERO ? (sample.powerWatts / powerLimitWatts) * PERCENT : ZERO;

const scoreTemperature = (sample: MetricSample, settings: HealthSettings): number => {
  const { thresholds, scoring } = settings;
  const curve = piecewiseScore(sample.temperatureC, {
    baseline: scoring.tempBaseline,
    warn: thresholds.tempWarn,
    crit: thresholds.tempCrit,
    warnScore: scoring.warnScore,
  });
  return clampScore(curve - (sample.throttled ? scoring.throttlePenalty : ZERO));
};

/** 1 when matching the best observed efficiency, lower on regression, 1 when not measurable */
const efficiencyRatio = (sample: MetricSample, trends: TrendStats, minUtilizationPct: number): number => {
  const efficiency = efficiencyOf(sample, minUtilizationPct);
  if (efficiency === null || trends.bestEfficiency <= ZERO) return ONE;
  return Math.min(ONE, efficiency / trends.bestEfficiency);
};

const scorePower = (sample: MetricSample, trends: TrendStats, settings: HealthSettings): number => {
  const { thresholds, scoring } = settings;
  const curve = piecewiseScore(powerPercent(sample, scoring.powerLimitWatts), {
    baseline: scoring.powerBaselinePct,
    warn: thresholds.powerWarn,
    crit: thresholds.powerCrit,
    warnScore: scoring.warnScore,
  });
  const ratio = efficiencyRatio(sample, trends, scoring.minEfficiencyUtilizationPct);
  const efficiencyLoss = scoring.efficiencyPenalty * (ONE - ratio);
  const spikeLoss = trends.powerSpikeCount > scoring.powerSpikeTolerance ? scoring.powerSpikePenalty : ZERO;
  return clampScore(curve - efficiencyLoss - spikeLoss);
};

const scoreMemory = (sample: MetricSample, memory: MemoryHealth, settings: HealthSettings): number => {
  const { thresholds, scoring } = settings;
  const curve = piecewiseScore(readMetric(sample, 'memoryUsedPct'), {
    baseline: scoring.memBaselinePct,
    warn: thresholds.memWarn,
    crit: thresholds.memCrit,
    warnScore: scoring.warnScore,
  });
  const leakLoss = memory.leakSuspected ? scoring.leakPenalty : ZERO;
  const fragmentationLoss = memory.fragmentationPressure * scoring.fragmentationWeight;
  return clampScore(curve - leakLoss - fragmentationLoss);
};

/** Weighted composite, rounded to the nearest integer */
export const compositeScore = (temperature: number, power: number, memory: number): number =>
  clampScore(Math.round(TEMPERATURE_WEIGHT * temperature + POWER_WEIGHT * power + MEMORY_WEIGHT * memory));

/**
 * Score one device from its latest sample and derived stats.
 */
export const scoreHealth = (
  sample: MetricSample,
  trends: TrendStats,
  memory: MemoryHealth,
  settings: HealthSettings
): HealthScore => {
  const temperatureComponent = scoreTemperature(sample, settings);
  const powerComponent = scorePower(sample, trends, settings);
  const memoryComponent = scoreMemory(sample, memory, settings);
  return {
    overall: compositeScore(temperatureComponent, powerComponent, memoryComponent),
    temperatureComponent,
    powerComponent,
    memoryComponent,
  };
};

export const healthStatus = (overall: number): HealthStatus => {
  if (overall >= EXCELLENT_MIN) return 'excellent';
  if (overall >= GOOD_MIN) return 'good';
  if (overall >= WARNING_MIN) return 'warning';
  return 'critical';
};
