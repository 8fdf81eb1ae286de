/**
 * Type definitions for the Device Session Registry and the snapshots it publishes.
 */
import type { Alert, AlertListener, AlertTransition, Unsubscribe } from './alertTypes.js';
import type { HealthScore, HealthStatus, MemoryHealth, TrendStats } from './healthTypes.js';
import type { DeviceId, LogFn, MetricSample, NumericSampleField, SettingsProvider } from './types.js';

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * A field that was replaced on ingestion because it was out of range or not a number.
 */
export interface SampleWarning {
  field: NumericSampleField;
  received: number;
  applied: number;
}

/** Degraded conditions recorded for a device */
export interface SnapshotDiagnostics {
  /** Fields clamped on the tick that produced this snapshot */
  sampleWarnings: readonly SampleWarning[];
  /** Samples with at least one clamped field since the session started */
  clampedSampleCount: number;
  /** Gaps between ticks longer than the stale limit since the session started */
  gapCount: number;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Immutable result of one complete tick for one device.
 * Each tick fully replaces the previous snapshot.
 */
export interface HealthSnapshot {
  deviceId: DeviceId;
  /** Number of ticks applied to this device, starting at 1 */
  sequence: number;
  sample: MetricSample;
  trendStats: TrendStats;
  memoryHealth: MemoryHealth;
  healthScore: HealthScore;
  healthStatus: HealthStatus;
  activeAlerts: readonly Alert[];
  /** Sampled time, excluding gaps longer than the stale limit */
  uptimeSeconds: number;
  /** No tick arrived for longer than the stale limit (evaluated when read) */
  stale: boolean;
  diagnostics: SnapshotDiagnostics;
}

/** What the display surface shows for the selected device */
export type SelectedView = { state: 'no-data' } | { state: 'ready'; snapshot: HealthSnapshot };

// =============================================================================
// Registry
// =============================================================================

/**
 * Registry configuration. Everything is optional.
 */
export interface DeviceRegistryConfig {
  /** Samples retained per device (default: 300) */
  historyCapacity?: number;
  /** Consecutive clear ticks before an active alert closes (default: 3) */
  clearDebounceTicks?: number;
  /** Expected time between ticks (default: 1000) */
  expectedIntervalMs?: number;
  /** Missed intervals after which a device is reported stale (default: 5) */
  staleAfterIntervals?: number;
  /** Alert transitions kept per device for getAlertHistory (default: 100) */
  alertHistoryLimit?: number;
  /** Thresholds and scoring constants, read once per tick (default: built-in defaults) */
  getSettings?: SettingsProvider;
  /** Clock used to decide staleness on read (default: Date.now) */
  now?: () => number;
  onLog?: LogFn;
}

/**
 * Device Session Registry instance.
 */
export interface DeviceRegistryInstance {
  /**
   * Ingest one sample for a device and publish a new snapshot.
   * Creates the session on the first sample for a device.
   */
  tick: (deviceId: DeviceId, sample: MetricSample) => HealthSnapshot;
  /** Latest snapshot. Throws UnknownDeviceError when the device never reported. */
  snapshot: (deviceId: DeviceId) => HealthSnapshot;
  /** Throws UnknownDeviceError when the device never reported. */
  select: (deviceId: DeviceId) => void;
  getSelectedDevice: () => DeviceId | null;
  viewSelected: () => SelectedView;
  listDevices: () => DeviceId[];
  /** Full retained history, oldest first. Throws UnknownDeviceError. */
  history: (deviceId: DeviceId) => readonly MetricSample[];
  /** Most recent alert transitions, newest first. Throws UnknownDeviceError. */
  getAlertHistory: (deviceId: DeviceId, limit?: number) => readonly AlertTransition[];
  /** Subscribe to alert transitions of every device */
  subscribe: (listener: AlertListener) => Unsubscribe;
}
