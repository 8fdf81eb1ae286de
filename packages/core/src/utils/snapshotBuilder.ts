/**
 * Builds immutable HealthSnapshot values.
 */
import type { Alert } from '../alertTypes.js';
import type { HealthScore, MemoryHealth, TrendStats } from '../healthTypes.js';
import type { HealthSnapshot, SampleWarning } from '../registryTypes.js';
import type { DeviceId, MetricSample } from '../types.js';
import { healthStatus } from './healthScorer.js';

const MS_PER_SECOND = 1000;

/** Recursively freeze plain objects and arrays */
export const deepFreeze = <T>(value: T): Readonly<T> => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

export interface SnapshotParts {
  deviceId: DeviceId;
  sequence: number;
  sample: MetricSample;
  trendStats: TrendStats;
  memoryHealth: MemoryHealth;
  healthScore: HealthScore;
  activeAlerts: Alert[];
  uptimeMs: number;
  sampleWarnings: SampleWarning[];
  clampedSampleCount: number;
  gapCount: number;
}

export const buildSnapshot = (parts: SnapshotParts): HealthSnapshot =>
  deepFreeze({
    deviceId: parts.deviceId,
    sequence: parts.sequence,
    sample: parts.sample,
    trendStats: parts.trendStats,
    memoryHealth: parts.memoryHealth,
    healthScore: parts.healthScore,
    healthStatus: healthStatus(parts.healthScore.overall),
    activeAlerts: parts.activeAlerts,
    uptimeSeconds: parts.uptimeMs / MS_PER_SECOND,
    stale: false,
    diagnostics: {
      sampleWarnings: parts.sampleWarnings,
      clampedSampleCount: parts.clampedSampleCount,
      gapCount: parts.gapCount,
    },
  });

/** Same snapshot with the staleness flag evaluated at read time */
export const withStaleness = (snapshot: HealthSnapshot, stale: boolean): HealthSnapshot =>
  snapshot.stale === stale ? snapshot : Object.freeze({ ...snapshot, stale });
