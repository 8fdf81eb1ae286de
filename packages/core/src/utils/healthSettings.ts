/**
 * Default thresholds and scoring constants.
 */
import type { HealthSettings, ScoringConfig, Thresholds } from '../types.js';

export const DEFAULT_THRESHOLDS: Thresholds = {
  tempWarn: 80,
  tempCrit: 90,
  powerWarn: 85,
  powerCrit: 95,
  memWarn: 80,
  memCrit: 95,
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  tempBaseline: 60,
  powerBaselinePct: 50,
  memBaselinePct: 50,
  warnScore: 60,
  powerLimitWatts: 300,
  efficiencyPenalty: 30,
  minEfficiencyUtilizationPct: 5,
  powerSpikeDeltaWatts: 20,
  powerSpikeLookback: 10,
  powerSpikeTolerance: 5,
  powerSpikePenalty: 5,
  powerSpikeAlertCount: 8,
  rapidHeatingRiseC: 15,
  rapidHeatingWindowSeconds: 300,
  throttlePenalty: 25,
  leakPenalty: 20,
  fragmentationWeight: 0.2,
  leakRatio: 1.1,
  leakMonotonicFraction: 0.6,
  leakMinSamples: 10,
  fragmentationDeltaCeilingPct: 5,
};

export const DEFAULT_HEALTH_SETTINGS: HealthSettings = {
  thresholds: DEFAULT_THRESHOLDS,
  scoring: DEFAULT_SCORING_CONFIG,
};

/** Partial settings, as supplied by a settings file or an API update */
export interface HealthSettingsOverrides {
  thresholds?: Partial<Thresholds>;
  scoring?: Partial<ScoringConfig>;
}

/** Merge overrides over a base (defaults unless given) */
export const mergeHealthSettings = (
  overrides: HealthSettingsOverrides,
  base: HealthSettings = DEFAULT_HEALTH_SETTINGS
): HealthSettings => ({
  thresholds: { ...base.thresholds, ...overrides.thresholds },
  scoring: { ...base.scoring, ...overrides.scoring },
});
