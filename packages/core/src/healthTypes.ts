/**
 * Type definitions for derived health data: trends, memory heuristics and scores.
 * All of these are recomputed on every tick and never persisted.
 */
import type { TrackedMetric } from './types.js';

// =============================================================================
// Trend Types
// =============================================================================

/** Highest value observed in the window and when it occurred */
export interface PeakValue {
  value: number;
  timestamp: number;
}

/**
 * Rolling statistics for one metric over the retained window.
 */
export interface MetricTrend {
  sampleCount: number;
  mean: number;
  min: number;
  max: number;
  /** Least-squares slope in metric units per second (0 with fewer than 2 samples) */
  slopePerSecond: number;
  /** null while the window is empty */
  peak: PeakValue | null;
}

/** Seconds spent at or above each warn threshold within the window */
export interface TimeAboveWarn {
  temperature: number;
  power: number;
  memory: number;
}

/**
 * Trend statistics for every tracked metric of one device.
 */
export interface TrendStats {
  /** Time span between the oldest and newest sample in the window */
  windowSeconds: number;
  metrics: Record<TrackedMetric, MetricTrend>;
  secondsAboveWarn: TimeAboveWarn;
  /** Sudden power increases among the newest deltas */
  powerSpikeCount: number;
  /** Newest temperature minus the oldest one inside the heating window */
  temperatureRiseC: number;
  /** Best utilization-per-watt observed in the window (0 when never measurable) */
  bestEfficiency: number;
}

// =============================================================================
// Memory Health Types
// =============================================================================

/**
 * Heuristic leak/fragmentation analysis of the memory-usage history.
 * No device exposes true fragmentation without vendor APIs, so every result
 * carries heuristic: true.
 */
export interface MemoryHealth {
  leakSuspected: boolean;
  /** 0-100 */
  fragmentationPressure: number;
  /** Memory usage trend in percentage points per second */
  usageTrendSlope: number;
  heuristic: true;
  /** 0-1, grows with the number of observed deltas */
  confidence: number;
}

// =============================================================================
// Score Types
// =============================================================================

/**
 * Composite health score.
 * overall === round(0.4 * temperature + 0.3 * power + 0.3 * memory), clamped to 0-100.
 */
export interface HealthScore {
  overall: number;
  temperatureComponent: number;
  powerComponent: number;
  memoryComponent: number;
}

/** Health band derived from HealthScore.overall */
export type HealthStatus = 'excellent' | 'good' | 'warning' | 'critical';
