import { describe, expect, it } from '@jest/globals';

import type { AlertTransition } from '../alertTypes.js';
import { UnknownDeviceError, isUnknownDeviceError } from '../errors.js';
import type { HealthSettings } from '../types.js';
import {
  BASE_TIME,
  COOL_TEMPERATURE_C,
  ONE,
  TEN,
  THREE,
  TICK_MS,
  TWO,
  WARM_TEMPERATURE_C,
  ZERO,
  createTestClock,
  createTestRegistry,
  feedTemperature,
  sampleAt,
  settingsWith,
} from './deviceRegistry.helpers.js';

const DEVICE = 'gpu0';
const OTHER_DEVICE = 'gpu1';
const STALE_LIMIT_MS = 5000;

describe('DeviceRegistry - alert deduplication', () => {
  it('should raise a single alert for a persistent condition', () => {
    const registry = createTestRegistry();
    const transitions: AlertTransition[] = [];
    registry.subscribe((t) => transitions.push(t));

    feedTemperature(registry, DEVICE, { start: ZERO, count: TEN, temperatureC: WARM_TEMPERATURE_C });

    const { activeAlerts } = registry.snapshot(DEVICE);
    expect(activeAlerts).toHaveLength(ONE);
    expect(activeAlerts[ZERO]?.category).toBe('temperature');
    expect(activeAlerts[ZERO]?.severity).toBe('warning');
    expect(activeAlerts[ZERO]?.occurrenceCount).toBe(TEN);
    expect(activeAlerts[ZERO]?.firstSeen).toBe(BASE_TIME);
    expect(activeAlerts[ZERO]?.lastSeen).toBe(BASE_TIME + 9 * TICK_MS);
    expect(transitions.map((t) => t.kind)).toEqual(['raised']);
  });

  it('should keep the alert through a single clear tick and close it after the debounce', () => {
    const registry = createTestRegistry();
    feedTemperature(registry, DEVICE, { start: ZERO, count: TEN, temperatureC: WARM_TEMPERATURE_C });

    feedTemperature(registry, DEVICE, { start: TEN, count: ONE, temperatureC: COOL_TEMPERATURE_C });
    expect(registry.snapshot(DEVICE).activeAlerts).toHaveLength(ONE);

    feedTemperature(registry, DEVICE, { start: TEN + ONE, count: TWO, temperatureC: COOL_TEMPERATURE_C });
    expect(registry.snapshot(DEVICE).activeAlerts).toEqual([]);
  });

  it('should deliver transitions only to current subscribers', () => {
    const registry = createTestRegistry();
    const kinds: string[] = [];
    const unsubscribe = registry.subscribe((t) => kinds.push(t.kind));
    feedTemperature(registry, DEVICE, { start: ZERO, count: ONE, temperatureC: WARM_TEMPERATURE_C });
    unsubscribe();
    feedTemperature(registry, DEVICE, { start: ONE, count: ONE, temperatureC: 95 });
    expect(kinds).toEqual(['raised']);
  });

  it('should return alert history newest first', () => {
    const registry = createTestRegistry();
    feedTemperature(registry, DEVICE, { start: ZERO, count: THREE, temperatureC: WARM_TEMPERATURE_C });
    feedTemperature(registry, DEVICE, { start: THREE, count: ONE, temperatureC: 95 });
    feedTemperature(registry, DEVICE, { start: 4, count: THREE, temperatureC: COOL_TEMPERATURE_C });

    expect(registry.getAlertHistory(DEVICE).map((t) => t.kind)).toEqual(['cleared', 'escalated', 'raised']);
    expect(registry.getAlertHistory(DEVICE, ONE).map((t) => t.kind)).toEqual(['cleared']);
  });
});

describe('DeviceRegistry - unknown devices and selection', () => {
  it('should throw UnknownDeviceError for a device that never reported', () => {
    const registry = createTestRegistry();
    expect(() => registry.snapshot('ghost')).toThrow(UnknownDeviceError);
    expect(() => registry.select('ghost')).toThrow(
      "Unknown device 'ghost': no sample has been received for it yet"
    );
    expect(() => registry.history('ghost')).toThrow(UnknownDeviceError);
    expect(() => registry.getAlertHistory('ghost')).toThrow(UnknownDeviceError);
  });

  it('should expose the error code for callers', () => {
    const registry = createTestRegistry();
    let caught: unknown = null;
    try {
      registry.snapshot('ghost');
    } catch (error) {
      caught = error;
    }
    expect(isUnknownDeviceError(caught)).toBe(true);
    if (!isUnknownDeviceError(caught)) return;
    expect(caught.code).toBe('UNKNOWN_DEVICE');
    expect(caught.deviceId).toBe('ghost');
  });

  it('should report no data before any sample arrives', () => {
    const registry = createTestRegistry();
    expect(registry.viewSelected()).toEqual({ state: 'no-data' });
    expect(registry.getSelectedDevice()).toBeNull();
    expect(registry.listDevices()).toEqual([]);
  });

  it('should auto-select the first device and keep an explicit selection', () => {
    const registry = createTestRegistry();
    registry.tick(DEVICE, sampleAt(ZERO));
    registry.tick(OTHER_DEVICE, sampleAt(ZERO));
    expect(registry.getSelectedDevice()).toBe(DEVICE);

    registry.select(OTHER_DEVICE);
    registry.tick(DEVICE, sampleAt(ONE));
    const view = registry.viewSelected();
    expect(view.state).toBe('ready');
    if (view.state !== 'ready') return;
    expect(view.snapshot.deviceId).toBe(OTHER_DEVICE);
    expect(registry.listDevices()).toEqual([DEVICE, OTHER_DEVICE]);
  });
});

describe('DeviceRegistry - sample sanitizing', () => {
  it('should clamp out-of-range fields and record each correction in order', () => {
    const registry = createTestRegistry();
    const snapshot = registry.tick(DEVICE, sampleAt(ZERO, { utilizationPct: 140, temperatureC: -5 }));

    expect(snapshot.sample.utilizationPct).toBe(100);
    expect(snapshot.sample.temperatureC).toBe(ZERO);
    expect(snapshot.diagnostics.sampleWarnings).toEqual([
      { field: 'utilizationPct', received: 140, applied: 100 },
      { field: 'temperatureC', received: -5, applied: 0 },
    ]);
    expect(snapshot.diagnostics.clampedSampleCount).toBe(ONE);

    const next = registry.tick(DEVICE, sampleAt(ONE));
    expect(next.diagnostics.sampleWarnings).toEqual([]);
    expect(next.diagnostics.clampedSampleCount).toBe(ONE);
  });

  it('should replace a non-finite value with the previous sample value', () => {
    const registry = createTestRegistry();
    registry.tick(DEVICE, sampleAt(ZERO, { temperatureC: 66 }));
    const snapshot = registry.tick(DEVICE, sampleAt(ONE, { temperatureC: Number.NaN }));
    expect(snapshot.sample.temperatureC).toBe(66);
    expect(snapshot.diagnostics.sampleWarnings).toEqual([
      { field: 'temperatureC', received: Number.NaN, applied: 66 },
    ]);
  });

  it('should replace a non-finite value on the first sample with 0', () => {
    const registry = createTestRegistry();
    const snapshot = registry.tick(DEVICE, sampleAt(ZERO, { powerWatts: Number.POSITIVE_INFINITY }));
    expect(snapshot.sample.powerWatts).toBe(ZERO);
  });

  it('should hold a regressing timestamp at the previous one', () => {
    const registry = createTestRegistry();
    registry.tick(DEVICE, sampleAt(5));
    const snapshot = registry.tick(DEVICE, sampleAt(THREE));
    expect(snapshot.sample.timestamp).toBe(BASE_TIME + 5 * TICK_MS);
    expect(snapshot.diagnostics.sampleWarnings).toEqual([
      { field: 'timestamp', received: BASE_TIME + THREE * TICK_MS, applied: BASE_TIME + 5 * TICK_MS },
    ]);
  });

  it('should stamp a non-finite timestamp with the receipt time', () => {
    const clock = createTestClock();
    const registry = createTestRegistry({ now: clock.now });
    registry.tick(DEVICE, sampleAt(ZERO));
    clock.set(BASE_TIME + 4 * TICK_MS);
    const snapshot = registry.tick(DEVICE, sampleAt(ONE, { timestamp: Number.NaN }));
    expect(snapshot.sample.timestamp).toBe(BASE_TIME + 4 * TICK_MS);
    expect(snapshot.uptimeSeconds).toBe(4);
    expect(snapshot.diagnostics.sampleWarnings).toEqual([
      { field: 'timestamp', received: Number.NaN, applied: BASE_TIME + 4 * TICK_MS },
    ]);
  });

  it('should not let a receipt-time stamp move behind the previous sample', () => {
    const registry = createTestRegistry();
    registry.tick(DEVICE, sampleAt(5));
    const snapshot = registry.tick(DEVICE, sampleAt(6, { timestamp: Number.POSITIVE_INFINITY }));
    expect(snapshot.sample.timestamp).toBe(BASE_TIME + 5 * TICK_MS);
  });
});

describe('DeviceRegistry - staleness and gaps', () => {
  it('should flag a snapshot stale only after the limit has passed', () => {
    const clock = createTestClock();
    const registry = createTestRegistry({ now: clock.now });
    registry.tick(DEVICE, sampleAt(ZERO));

    clock.set(BASE_TIME + STALE_LIMIT_MS);
    expect(registry.snapshot(DEVICE).stale).toBe(false);

    clock.set(BASE_TIME + STALE_LIMIT_MS + ONE);
    expect(registry.snapshot(DEVICE).stale).toBe(true);

    registry.tick(DEVICE, sampleAt(ONE));
    expect(registry.snapshot(DEVICE).stale).toBe(false);
  });

  it('should count a long pause as a gap and exclude it from uptime', () => {
    const registry = createTestRegistry();
    registry.tick(DEVICE, sampleAt(ZERO));
    registry.tick(DEVICE, sampleAt(ONE));
    registry.tick(DEVICE, sampleAt(TWO));
    const snapshot = registry.tick(DEVICE, sampleAt(TEN));
    expect(snapshot.diagnostics.gapCount).toBe(ONE);
    expect(snapshot.uptimeSeconds).toBe(TWO);
    expect(snapshot.sequence).toBe(4);
  });

  it('should log when a stale device reports again', () => {
    const clock = createTestClock();
    const messages: string[] = [];
    const registry = createTestRegistry({ now: clock.now, onLog: (message) => messages.push(message) });
    registry.tick(DEVICE, sampleAt(ZERO));
    clock.set(BASE_TIME + TEN * TICK_MS);
    registry.tick(DEVICE, sampleAt(TEN));
    expect(messages).toContain('DeviceRegistry| Device reporting again after a gap');
  });
});

describe('DeviceRegistry - settings', () => {
  it('should apply updated settings on the next tick', () => {
    let settings: HealthSettings = settingsWith({});
    const registry = createTestRegistry({ getSettings: () => settings });

    expect(registry.tick(DEVICE, sampleAt(ZERO, { temperatureC: 75 })).activeAlerts).toEqual([]);

    settings = settingsWith({ thresholds: { tempWarn: 70 }, scoring: { tempBaseline: 55 } });
    const { activeAlerts } = registry.tick(DEVICE, sampleAt(ONE, { temperatureC: 75 }));
    expect(activeAlerts.map((a) => [a.category, a.severity, a.threshold])).toEqual([
      ['temperature', 'warning', 70],
    ]);
  });

  it('should reject invalid settings and keep the previous snapshot', () => {
    let settings: HealthSettings = settingsWith({});
    const registry = createTestRegistry({ getSettings: () => settings });
    registry.tick(DEVICE, sampleAt(ZERO));

    settings = settingsWith({ thresholds: { tempWarn: 95 } });
    expect(() => registry.tick(DEVICE, sampleAt(ONE))).toThrow('tempWarn must be below tempCrit. Got: 95 >= 90');
    expect(registry.snapshot(DEVICE).sequence).toBe(ONE);
    expect(registry.history(DEVICE)).toHaveLength(ONE);
  });

  it('should reject an invalid registry configuration', () => {
    expect(() => createTestRegistry({ historyCapacity: ZERO })).toThrow(
      'historyCapacity must be a positive integer. Got: 0'
    );
  });
});

describe('DeviceRegistry - isolation and immutability', () => {
  it('should keep a failing listener from affecting the tick or other listeners', () => {
    const messages: string[] = [];
    const registry = createTestRegistry({ onLog: (message) => messages.push(message) });
    const received: string[] = [];
    registry.subscribe(() => {
      throw new Error('listener down');
    });
    registry.subscribe((t) => received.push(t.kind));

    const snapshot = registry.tick(DEVICE, sampleAt(ZERO, { temperatureC: WARM_TEMPERATURE_C }));
    expect(snapshot.activeAlerts).toHaveLength(ONE);
    expect(received).toEqual(['raised']);
    expect(messages).toContain('DeviceRegistry| Alert listener failed');
  });

  it('should publish frozen snapshots', () => {
    const registry = createTestRegistry();
    const snapshot = registry.tick(DEVICE, sampleAt(ZERO));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.sample)).toBe(true);
    expect(Object.isFrozen(snapshot.healthScore)).toBe(true);
    expect(Object.isFrozen(snapshot.trendStats.metrics.temperatureC)).toBe(true);
    expect(() => {
      snapshot.sequence = 99;
    }).toThrow(TypeError);
  });

  it('should keep devices independent', () => {
    const registry = createTestRegistry();
    feedTemperature(registry, DEVICE, { start: ZERO, count: THREE, temperatureC: WARM_TEMPERATURE_C });
    feedTemperature(registry, OTHER_DEVICE, { start: ZERO, count: ONE, temperatureC: COOL_TEMPERATURE_C });

    expect(registry.snapshot(DEVICE).activeAlerts).toHaveLength(ONE);
    expect(registry.snapshot(OTHER_DEVICE).activeAlerts).toEqual([]);
    expect(registry.history(DEVICE)).toHaveLength(THREE);
    expect(registry.history(OTHER_DEVICE)).toHaveLength(ONE);
    expect(registry.snapshot(OTHER_DEVICE).sequence).toBe(ONE);
  });

  it('should not share state between registries', () => {
    const first = createTestRegistry();
    const second = createTestRegistry();
    first.tick(DEVICE, sampleAt(ZERO));
    expect(second.listDevices()).toEqual([]);
  });
});
