/**
 * Evaluates the per-category alert conditions for one sample.
 */
import type { AlertCategory, AlertCondition, AlertSeverity } from '../alertTypes.js';
import type { MemoryHealth, TrendStats } from '../healthTypes.js';
import type { HealthSettings, MetricSample } from '../types.js';
import { powerPercent } from './healthScorer.js';
import { readMetric } from './historyStore.js';

const ZERO = 0;
const DECIMALS = 1;

export const ALERT_CATEGORIES: readonly AlertCategory[] = [
  'temperature',
  'power',
  'memory',
  'throttling',
  'heating',
  'powerSpikes',
];

interface ThresholdCheck {
  value: number;
  warn: number;
  crit: number;
}

/** Highest severity crossed, or null below warn */
const thresholdSeverity = ({ value, warn, crit }: ThresholdCheck): AlertSeverity | null => {
  if (value >= crit) return 'critical';
  if (value >= warn) return 'warning';
  return null;
};

const fmt = (value: number): string => value.toFixed(DECIMALS);

const temperatureCondition = (sample: MetricSample, settings: HealthSettings): AlertCondition => {
  const { tempWarn, tempCrit } = settings.thresholds;
  const value = sample.temperatureC;
  const severity = thresholdSeverity({ value, warn: tempWarn, crit: tempCrit });
  const threshold = severity === 'critical' ? tempCrit : tempWarn;
  return {
    severity,
    value,
    threshold,
    message:
      severity === 'critical'
        ? `Temperature ${fmt(value)}°C exceeds the critical limit of ${fmt(tempCrit)}°C`
        : `Temperature ${fmt(value)}°C is above the warning level of ${fmt(tempWarn)}°C`,
  };
};

const powerCondition = (sample: MetricSample, settings: HealthSettings): AlertCondition => {
  const { powerWarn, powerCrit } = settings.thresholds;
  const value = powerPercent(sample, settings.scoring.powerLimitWatts);
  const severity = thresholdSeverity({ value, warn: powerWarn, crit: powerCrit });
  const threshold = severity === 'critical' ? powerCrit : powerWarn;
  return {
    severity,
    value,
    threshold,
    message: `Power draw ${fmt(sample.powerWatts)}W is ${fmt(value)}% of the board limit (threshold ${fmt(threshold)}%)`,
  };
};

const memoryCondition = (
  sample: MetricSample,
  memory: MemoryHealth,
  settings: HealthSettings
): AlertCondition => {
  const { memWarn, memCrit } = settings.thresholds;
  const value = readMetric(sample, 'memoryUsedPct');
  const severity = thresholdSeverity({ value, warn: memWarn, crit: memCrit });
  if (severity === null && memory.leakSuspected) {
    return {
      severity: 'info',
      value,
      threshold: memWarn,
      message: `Memory usage at ${fmt(value)}% is growing steadily; possible leak (heuristic)`,
    };
  }
  const threshold = severity === 'critical' ? memCrit : memWarn;
  return {
    severity,
    value,
    threshold,
    message: `Memory usage ${fmt(value)}% is above the ${severity === 'critical' ? 'critical' : 'warning'} level of ${fmt(threshold)}%`,
  };
};

const throttlingCondition = (sample: MetricSample): AlertCondition => ({
  severity: sample.throttled ? 'warning' : null,
  value: sample.temperatureC,
  threshold: ZERO,
  message: `Device is throttling at ${fmt(sample.temperatureC)}°C; performance reduced`,
});

const heatingCondition = (trends: TrendStats, settings: HealthSettings): AlertCondition => {
  const { rapidHeatingRiseC, rapidHeatingWindowSeconds } = settings.scoring;
  const value = trends.temperatureRiseC;
  return {
    severity: value > rapidHeatingRiseC ? 'warning' : null,
    value,
    threshold: rapidHeatingRiseC,
    message: `Temperature rising rapidly (+${fmt(value)}°C in ${rapidHeatingWindowSeconds}s)`,
  };
};

const powerSpikesCondition = (trends: TrendStats, settings: HealthSettings): AlertCondition => {
  const { powerSpikeAlertCount } = settings.scoring;
  const value = trends.powerSpikeCount;
  return {
    severity: value >= powerSpikeAlertCount ? 'warning' : null,
    value,
    threshold: powerSpikeAlertCount,
    message: `Detected ${value} power spikes; check power supply stability`,
  };
};

/**
 * Conditions for every category on this tick.
 */
export const evaluateAlertConditions = (
  sample: MetricSample,
  trends: TrendStats,
  memory: MemoryHealth,
  settings: HealthSettings
): Record<AlertCategory, AlertCondition> => ({
  temperature: temperatureCondition(sample, settings),
  power: powerCondition(sample, settings),
  memory: memoryCondition(sample, memory, settings),
  throttling: throttlingCondition(sample),
  heating: heatingCondition(trends, settings),
  powerSpikes: powerSpikesCondition(trends, settings),
});
