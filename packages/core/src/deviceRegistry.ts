/** Device Session Registry: single ingestion entry point and snapshot source for every device. */
import type { AlertListener, AlertTransition, Unsubscribe } from './alertTypes.js';
import { UnknownDeviceError } from './errors.js';
import type {
  DeviceRegistryConfig,
  DeviceRegistryInstance,
  HealthSnapshot,
  SelectedView,
} from './registryTypes.js';
import type { DeviceId, HealthSettings, MetricSample, SettingsProvider } from './types.js';
import { DEFAULT_ALERT_HISTORY_LIMIT, DEFAULT_CLEAR_DEBOUNCE_TICKS } from './utils/alertEngine.js';
import { evaluateAlertConditions } from './utils/alertConditions.js';
import { validateHealthSettings, validateRegistryConfig } from './utils/configValidation.js';
import { DeviceSession } from './utils/deviceSession.js';
import { DEFAULT_HEALTH_SETTINGS } from './utils/healthSettings.js';
import { scoreHealth } from './utils/healthScorer.js';
import { type AppendReceipt, DEFAULT_HISTORY_CAPACITY, HistoryStore } from './utils/historyStore.js';
import { analyzeMemoryHealth } from './utils/memoryHealth.js';
import { sanitizeSample } from './utils/sampleSanitizer.js';
import { buildSnapshot, withStaleness } from './utils/snapshotBuilder.js';
import { analyzeTrends } from './utils/trendAnalyzer.js';

const ZERO = 0;
const DEFAULT_LABEL = 'DeviceRegistry';
const DEFAULT_EXPECTED_INTERVAL_MS = 1000;
const DEFAULT_STALE_AFTER_INTERVALS = 5;

const defaultSettingsProvider: SettingsProvider = () => DEFAULT_HEALTH_SETTINGS;

class DeviceRegistry implements DeviceRegistryInstance {
  private readonly label: string;
  private readonly config: DeviceRegistryConfig;
  private readonly historyStore: HistoryStore;
  private readonly sessions = new Map<DeviceId, DeviceSession>();
  private readonly listeners = new Set<AlertListener>();
  private readonly getSettings: SettingsProvider;
  private readonly now: () => number;
  private readonly staleLimitMs: number;
  private readonly clearDebounceTicks: number;
  private readonly alertHistoryLimit: number;
  private selected: DeviceId | null = null;

  constructor(config: DeviceRegistryConfig) {
    validateRegistryConfig(config);
    this.config = config;
    this.label = DEFAULT_LABEL;
    this.historyStore = new HistoryStore(config.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
    this.getSettings = config.getSettings ?? defaultSettingsProvider;
    this.now = config.now ?? Date.now;
    this.staleLimitMs =
      (config.expectedIntervalMs ?? DEFAULT_EXPECTED_INTERVAL_MS) *
      (config.staleAfterIntervals ?? DEFAULT_STALE_AFTER_INTERVALS);
    this.clearDebounceTicks = config.clearDebounceTicks ?? DEFAULT_CLEAR_DEBOUNCE_TICKS;
    this.alertHistoryLimit = config.alertHistoryLimit ?? DEFAULT_ALERT_HISTORY_LIMIT;

    this.log('Initialized', {
      historyCapacity: this.historyStore.getCapacity(),
      clearDebounceTicks: this.clearDebounceTicks,
      staleLimitMs: this.staleLimitMs,
    });
  }

  private log(message: string, data?: Record<string, unknown>): void {
    this.config.onLog?.(`${this.label}| ${message}`, data);
  }

  private requireSession(deviceId: DeviceId): DeviceSession {
    const session = this.sessions.get(deviceId);
    if (session === undefined) {
      throw new UnknownDeviceError(deviceId);
    }
    return session;
  }

  private createSession(deviceId: DeviceId): DeviceSession {
    return new DeviceSession({
      deviceId,
      clearDebounceTicks: this.clearDebounceTicks,
      alertHistoryLimit: this.alertHistoryLimit,
      staleLimitMs: this.staleLimitMs,
    });
  }

  /** Settings are read exactly once per tick and used for every stage */
  private readSettings(): HealthSettings {
    const settings = this.getSettings();
    validateHealthSettings(settings);
    return settings;
  }

  tick(deviceId: DeviceId, raw: MetricSample): HealthSnapshot {
    const settings = this.readSettings();
    const receivedAt = this.now();
    const existing = this.sessions.get(deviceId);
    const session = existing ?? this.createSession(deviceId);
    const wasStale = existing?.isStale(receivedAt) ?? false;

    const previous = this.historyStore.latest(deviceId);
    const { sample, warnings } = sanitizeSample(raw, previous, receivedAt);
    const receipt = this.historyStore.append(deviceId, sample);

    let snapshot: HealthSnapshot;
    let transitions: AlertTransition[];
    try {
      const trendStats = analyzeTrends(this.historyStore.view(deviceId), settings);
      const memoryHealth = analyzeMemoryHealth(
        this.historyStore.window(deviceId, 'memoryUsedPct', { count: this.historyStore.getCapacity() }),
        settings.scoring
      );
      const healthScore = scoreHealth(sample, trendStats, memoryHealth, settings);
      const alertPlan = session.alerts.plan(
        evaluateAlertConditions(sample, trendStats, memoryHealth, settings),
        sample.timestamp
      );
      const update = session.planTick(previous?.timestamp, sample.timestamp, warnings.length > ZERO);

      snapshot = buildSnapshot({
        deviceId,
        sequence: update.sequence,
        sample,
        trendStats,
        memoryHealth,
        healthScore,
        activeAlerts: alertPlan.activeAlerts,
        uptimeMs: update.uptimeMs,
        sampleWarnings: warnings,
        clampedSampleCount: update.clampedSampleCount,
        gapCount: update.gapCount,
      });

      // Commit point: nothing below can fail
      session.alerts.commit(alertPlan);
      session.commit(update, snapshot, receivedAt);
      transitions = alertPlan.transitions;
    } catch (error) {
      this.revertAppend(receipt);
      throw error;
    }

    this.finishTick({ session, created: existing === undefined, wasStale, snapshot });
    this.publish(transitions);
    return snapshot;
  }

  private revertAppend(receipt: AppendReceipt): void {
    this.historyStore.revert(receipt);
    this.log('Tick reverted', { deviceId: receipt.deviceId });
  }

  private finishTick(params: {
    session: DeviceSession;
    created: boolean;
    wasStale: boolean;
    snapshot: HealthSnapshot;
  }): void {
    const { session, created, wasStale, snapshot } = params;
    const { deviceId } = session;
    if (created) {
      this.sessions.set(deviceId, session);
      this.selected ??= deviceId;
      this.log('Session created', { deviceId });
    }
    if (wasStale) {
      this.log('Device reporting again after a gap', { deviceId, gapCount: snapshot.diagnostics.gapCount });
    }
    if (snapshot.diagnostics.sampleWarnings.length > ZERO) {
      this.log('Sample clamped', { deviceId, warnings: snapshot.diagnostics.sampleWarnings });
    }
  }

  private publish(transitions: readonly AlertTransition[]): void {
    for (const transition of transitions) {
      const { alert } = transition;
      this.log(`Alert ${transition.kind}`, {
        id: alert.id,
        deviceId: alert.deviceId,
        category: alert.category,
        severity: alert.severity,
      });
      for (const listener of this.listeners) {
        try {
          listener(transition);
        } catch (error) {
          this.log('Alert listener failed', {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  snapshot(deviceId: DeviceId): HealthSnapshot {
    const session = this.requireSession(deviceId);
    const latest = session.getLatest();
    if (latest === null) {
      throw new UnknownDeviceError(deviceId);
    }
    return withStaleness(latest, session.isStale(this.now()));
  }

  select(deviceId: DeviceId): void {
    this.requireSession(deviceId);
    this.selected = deviceId;
  }

  getSelectedDevice(): DeviceId | null {
    return this.selected;
  }

  viewSelected(): SelectedView {
    if (this.selected === null) {
      return { state: 'no-data' };
    }
    return { state: 'ready', snapshot: this.snapshot(this.selected) };
  }

  listDevices(): DeviceId[] {
    return Array.from(this.sessions.keys());
  }

  history(deviceId: DeviceId): readonly MetricSample[] {
    this.requireSession(deviceId);
    return this.historyStore.samples(deviceId);
  }

  getAlertHistory(deviceId: DeviceId, limit: number = this.alertHistoryLimit): readonly AlertTransition[] {
    return this.requireSession(deviceId).alerts.recentTransitions(limit);
  }

  subscribe(listener: AlertListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/**
 * Create an isolated registry. Each registry owns its sessions; there is no
 * shared or global state between registries.
 */
export const createDeviceRegistry = (config: DeviceRegistryConfig = {}): DeviceRegistryInstance =>
  new DeviceRegistry(config);
