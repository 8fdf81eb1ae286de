/**
 * Per-device state owned by the registry: alert engine, latest snapshot,
 * uptime and diagnostic counters. Sample history lives in the shared
 * HistoryStore, keyed by device.
 */
import type { HealthSnapshot } from '../registryTypes.js';
import type { DeviceId } from '../types.js';
import { AlertEngine } from './alertEngine.js';

const ZERO = 0;
const ONE = 1;

export interface DeviceSessionConfig {
  deviceId: DeviceId;
  clearDebounceTicks: number;
  alertHistoryLimit: number;
  /** Gap between ticks beyond which the device counts as disconnected */
  staleLimitMs: number;
}

/** Counter updates produced by one tick, applied on commit */
export interface SessionTickUpdate {
  uptimeMs: number;
  gapCount: number;
  clampedSampleCount: number;
  sequence: number;
}

export class DeviceSession {
  readonly deviceId: DeviceId;
  readonly alerts: AlertEngine;
  private readonly staleLimitMs: number;
  private latest: HealthSnapshot | null = null;
  /** Clock time the latest tick was received */
  private lastReceivedAt: number | null = null;
  private uptimeMs = ZERO;
  private gapCount = ZERO;
  private clampedSampleCount = ZERO;
  private sequence = ZERO;

  constructor(config: DeviceSessionConfig) {
    this.deviceId = config.deviceId;
    this.staleLimitMs = config.staleLimitMs;
    this.alerts = new AlertEngine({
      deviceId: config.deviceId,
      clearDebounceTicks: config.clearDebounceTicks,
      historyLimit: config.alertHistoryLimit,
    });
  }

  getLatest(): HealthSnapshot | null {
    return this.latest;
  }

  /**
   * Counters after a tick with the given sample timestamps.
   * Gaps longer than the stale limit are not counted as uptime.
   */
  planTick(previousTimestamp: number | undefined, timestamp: number, clamped: boolean): SessionTickUpdate {
    let { uptimeMs, gapCount } = this;
    if (previousTimestamp !== undefined) {
      const delta = timestamp - previousTimestamp;
      if (delta > this.staleLimitMs) {
        gapCount += ONE;
      } else {
        uptimeMs += delta;
      }
    }
    return {
      uptimeMs,
      gapCount,
      clampedSampleCount: this.clampedSampleCount + (clamped ? ONE : ZERO),
      sequence: this.sequence + ONE,
    };
  }

  commit(update: SessionTickUpdate, snapshot: HealthSnapshot, receivedAt: number): void {
    this.uptimeMs = update.uptimeMs;
    this.gapCount = update.gapCount;
    this.clampedSampleCount = update.clampedSampleCount;
    this.sequence = update.sequence;
    this.latest = snapshot;
    this.lastReceivedAt = receivedAt;
  }

  isStale(now: number): boolean {
    return this.lastReceivedAt !== null && now - this.lastReceivedAt > this.staleLimitMs;
  }
}
