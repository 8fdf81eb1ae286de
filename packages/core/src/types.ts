/**
 * Type definitions for device telemetry and health settings.
 *
 * One MetricSample is produced per device per tick. Samples are frozen on
 * ingestion and never mutated afterwards.
 */

// =============================================================================
// Logging Types
// =============================================================================

/** Logging callback type */
export type LogFn = (message: string, data?: Record<string, unknown>) => void;

// =============================================================================
// Telemetry Types
// =============================================================================

/** Stable identifier of a monitored accelerator (ordinal indices are rendered as strings) */
export type DeviceId = string;

/**
 * One telemetry reading for one device.
 */
export interface MetricSample {
  /** Epoch milliseconds when the reading was taken */
  timestamp: number;
  /** Compute utilization, 0-100 */
  utilizationPct: number;
  /** Device memory in use (bytes) */
  memoryUsed: number;
  /** Device memory installed (bytes) */
  memoryTotal: number;
  /** Core temperature in degrees Celsius */
  temperatureC: number;
  /** Board power draw in watts */
  powerWatts: number;
  /** Fan speed, 0-100 */
  fanPct: number;
  coreClockMhz: number;
  memClockMhz: number;
  /** Hardware reports clocks or power reduced below the requested level */
  throttled: boolean;
}

/** Numeric fields of a sample that can be clamped on ingestion */
export type NumericSampleField = Exclude<keyof MetricSample, 'throttled'>;

/**
 * Metrics tracked by the history window.
 * memoryUsedPct is derived from memoryUsed / memoryTotal.
 */
export type TrackedMetric =
  | 'utilizationPct'
  | 'memoryUsedPct'
  | 'temperatureC'
  | 'powerWatts'
  | 'fanPct'
  | 'coreClockMhz'
  | 'memClockMhz';

/** A single (timestamp, value) point of one metric */
export interface MetricPoint {
  timestamp: number;
  value: number;
}

// =============================================================================
// Settings Types
// =============================================================================

/**
 * Alert and scoring thresholds.
 * Temperature in degrees Celsius, power as a percentage of the configured
 * power limit, memory as a percentage of total memory.
 */
export interface Thresholds {
  tempWarn: number;
  tempCrit: number;
  powerWarn: number;
  powerCrit: number;
  memWarn: number;
  memCrit: number;
}

/**
 * Interior constants of the scoring curves and memory heuristics.
 */
export interface ScoringConfig {
  /** Temperature at or below which the temperature component is 100 (default: 60) */
  tempBaseline: number;
  /** Power (% of limit) at or below which the power curve is 100 (default: 50) */
  powerBaselinePct: number;
  /** Memory usage (%) at or below which the memory curve is 100 (default: 50) */
  memBaselinePct: number;
  /** Curve value reached exactly at the warn threshold (default: 60) */
  warnScore: number;
  /** Board power limit used to express power draw as a percentage (default: 300) */
  powerLimitWatts: number;
  /** Maximum points lost to an efficiency regression (default: 30) */
  efficiencyPenalty: number;
  /** Utilization below which efficiency is not measured (default: 5) */
  minEfficiencyUtilizationPct: number;
  /** Sample-to-sample increase counted as a power spike (default: 20) */
  powerSpikeDeltaWatts: number;
  /** Number of newest deltas inspected for power spikes (default: 10) */
  powerSpikeLookback: number;
  /** Spike count above which the power component is penalised (default: 5) */
  powerSpikeTolerance: number;
  powerSpikePenalty: number;
  /** Spike count at which a power stability alert is raised (default: 8) */
  powerSpikeAlertCount: number;
  /** Temperature rise across the heating window that raises a heating alert (default: 15) */
  rapidHeatingRiseC: number;
  /** Span of the heating window (default: 300) */
  rapidHeatingWindowSeconds: number;
  /** Points subtracted from the temperature component while throttled (default: 25) */
  throttlePenalty: number;
  /** Points subtracted from the memory component when a leak is suspected (default: 20) */
  leakPenalty: number;
  /** Memory points lost per point of fragmentation pressure (default: 0.2) */
  fragmentationWeight: number;
  /** Newest-third / oldest-third mean ratio that counts as growth (default: 1.1) */
  leakRatio: number;
  /** Share of non-decreasing deltas required for a leak signal (default: 0.6) */
  leakMonotonicFraction: number;
  /** Minimum samples before the leak heuristic runs (default: 10) */
  leakMinSamples: number;
  /** Delta standard deviation (percentage points) treated as maximal volatility (default: 5) */
  fragmentationDeltaCeilingPct: number;
}

/**
 * Everything the core reads from the settings collaborator on each tick.
 */
export interface HealthSettings {
  thresholds: Thresholds;
  scoring: ScoringConfig;
}

/** Synchronous settings provider, called exactly once at the start of every tick */
export type SettingsProvider = () => HealthSettings;
