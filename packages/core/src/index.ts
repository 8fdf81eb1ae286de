// Main factory function
export { createDeviceRegistry } from './deviceRegistry.js';

// Errors
export { UnknownDeviceError, isUnknownDeviceError } from './errors.js';

// Telemetry and settings types
export type {
  DeviceId,
  HealthSettings,
  LogFn,
  MetricPoint,
  MetricSample,
  NumericSampleField,
  ScoringConfig,
  SettingsProvider,
  Thresholds,
  TrackedMetric,
} from './types.js';

// Derived health types
export type {
  HealthScore,
  HealthStatus,
  MemoryHealth,
  MetricTrend,
  PeakValue,
  TimeAboveWarn,
  TrendStats,
} from './healthTypes.js';

// Alert types
export type {
  Alert,
  AlertCategory,
  AlertCondition,
  AlertListener,
  AlertSeverity,
  AlertState,
  AlertTransition,
  AlertTransitionKind,
  Unsubscribe,
} from './alertTypes.js';

// Registry types
export type {
  DeviceRegistryConfig,
  DeviceRegistryInstance,
  HealthSnapshot,
  SampleWarning,
  SelectedView,
  SnapshotDiagnostics,
} from './registryTypes.js';

// Settings defaults and validation
export {
  DEFAULT_HEALTH_SETTINGS,
  DEFAULT_SCORING_CONFIG,
  DEFAULT_THRESHOLDS,
  mergeHealthSettings,
} from './utils/healthSettings.js';
export type { HealthSettingsOverrides } from './utils/healthSettings.js';
export { validateHealthSettings, validateThresholds } from './utils/configValidation.js';

// Pure analytics, usable without a registry
export { HistoryStore, DEFAULT_HISTORY_CAPACITY, readMetric } from './utils/historyStore.js';
export type { MetricWindow, WindowRange } from './utils/historyStore.js';
export { RingBuffer } from './utils/ringBuffer.js';
export { analyzeTrends, secondsAbove, summarizeMetric, TRACKED_METRICS } from './utils/trendAnalyzer.js';
export { analyzeMemoryHealth } from './utils/memoryHealth.js';
export { healthStatus, piecewiseScore, scoreHealth } from './utils/healthScorer.js';
export { stepAlertState, CLEAR_STATE } from './utils/alertStateMachine.js';
export { evaluateAlertConditions, ALERT_CATEGORIES } from './utils/alertConditions.js';
