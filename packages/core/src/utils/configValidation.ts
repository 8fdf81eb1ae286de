/**
 * Validation for registry configuration and health settings.
 */
import type { DeviceRegistryConfig } from '../registryTypes.js';
import type { HealthSettings, ScoringConfig, Thresholds } from '../types.js';

const ZERO = 0;
const ONE = 1;

type ThresholdPair = readonly [warnKey: keyof Thresholds, critKey: keyof Thresholds];

const THRESHOLD_PAIRS: readonly ThresholdPair[] = [
  ['tempWarn', 'tempCrit'],
  ['powerWarn', 'powerCrit'],
  ['memWarn', 'memCrit'],
];

const POSITIVE_SCORING_KEYS: ReadonlyArray<keyof ScoringConfig> = [
  'powerLimitWatts',
  'powerSpikeLookback',
  'powerSpikeAlertCount',
  'rapidHeatingWindowSeconds',
  'leakRatio',
  'fragmentationDeltaCeilingPct',
];

const requireFinite = (name: string, value: number): void => {
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a finite number. Got: ${value}`);
  }
};

/**
 * Validates thresholds.
 * @throws Error if a value is not finite or a warn threshold is not below its crit threshold
 */
export const validateThresholds = (thresholds: Thresholds): void => {
  for (const [warnKey, critKey] of THRESHOLD_PAIRS) {
    requireFinite(warnKey, thresholds[warnKey]);
    requireFinite(critKey, thresholds[critKey]);
    if (thresholds[warnKey] >= thresholds[critKey]) {
      throw new Error(
        `${warnKey} must be below ${critKey}. Got: ${thresholds[warnKey]} >= ${thresholds[critKey]}`
      );
    }
  }
};

/**
 * Validates scoring constants against the thresholds they shape.
 * @throws Error if a curve baseline is not below its warn threshold or a constant is out of range
 */
export const validateHealthSettings = (settings: HealthSettings): void => {
  const { thresholds, scoring } = settings;
  validateThresholds(thresholds);

  for (const [key, value] of Object.entries(scoring)) {
    requireFinite(key, value);
  }
  for (const key of POSITIVE_SCORING_KEYS) {
    if (scoring[key] <= ZERO) {
      throw new Error(`${key} must be greater than 0. Got: ${scoring[key]}`);
    }
  }
  if (scoring.tempBaseline >= thresholds.tempWarn) {
    throw new Error(`tempBaseline must be below tempWarn. Got: ${scoring.tempBaseline}`);
  }
  if (scoring.powerBaselinePct >= thresholds.powerWarn) {
    throw new Error(`powerBaselinePct must be below powerWarn. Got: ${scoring.powerBaselinePct}`);
  }
  if (scoring.memBaselinePct >= thresholds.memWarn) {
    throw new Error(`memBaselinePct must be below memWarn. Got: ${scoring.memBaselinePct}`);
  }
  if (scoring.leakMonotonicFraction < ZERO || scoring.leakMonotonicFraction > ONE) {
    throw new Error(`leakMonotonicFraction must be within [0, 1]. Got: ${scoring.leakMonotonicFraction}`);
  }
};

const requirePositiveInteger = (name: string, value: number | undefined): void => {
  if (value !== undefined && (!Number.isInteger(value) || value < ONE)) {
    throw new Error(`${name} must be a positive integer. Got: ${value}`);
  }
};

/**
 * Validates the registry configuration.
 */
export const validateRegistryConfig = (config: DeviceRegistryConfig): void => {
  requirePositiveInteger('historyCapacity', config.historyCapacity);
  requirePositiveInteger('clearDebounceTicks', config.clearDebounceTicks);
  requirePositiveInteger('staleAfterIntervals', config.staleAfterIntervals);
  requirePositiveInteger('alertHistoryLimit', config.alertHistoryLimit);
  if (config.expectedIntervalMs !== undefined && !(config.expectedIntervalMs > ZERO)) {
    throw new Error(`expectedIntervalMs must be greater than 0. Got: ${config.expectedIntervalMs}`);
  }
};
