/**
 * Alert lifecycle: raise, deduplicate, escalate, debounce and clear.
 */
import { describe, expect, it } from '@jest/globals';

import type { AlertCondition, AlertSeverity, AlertState } from '../alertTypes.js';
import type { MemoryHealth } from '../healthTypes.js';
import type { MetricSample } from '../types.js';
import { evaluateAlertConditions } from '../utils/alertConditions.js';
import { AlertEngine } from '../utils/alertEngine.js';
import { CLEAR_STATE, stepAlertState } from '../utils/alertStateMachine.js';
import { DEFAULT_HEALTH_SETTINGS } from '../utils/healthSettings.js';
import { analyzeMemoryHealth } from '../utils/memoryHealth.js';
import { analyzeTrends } from '../utils/trendAnalyzer.js';
import {
  BASE_TIME,
  GIB,
  MEMORY_TOTAL,
  ONE,
  THREE,
  TICK_MS,
  ZERO,
  makeSample,
  sampleAt,
} from './deviceRegistry.helpers.js';

const DEVICE = 'gpu0';

const calmMemory = analyzeMemoryHealth([], DEFAULT_HEALTH_SETTINGS.scoring);

/** Conditions for the newest of `samples`, with trends over all of them */
const conditionsFor = (samples: MetricSample[], memory: MemoryHealth = calmMemory) => {
  const latest = samples[samples.length - ONE];
  if (latest === undefined) throw new Error('Expected at least one sample');
  const trends = analyzeTrends(samples, DEFAULT_HEALTH_SETTINGS);
  return evaluateAlertConditions(latest, trends, memory, DEFAULT_HEALTH_SETTINGS);
};

const condition = (severity: AlertSeverity | null, value: number, threshold = 80): AlertCondition => ({
  severity,
  value,
  threshold,
  message: `value ${value}`,
});

/** Step the temperature machine through a sequence of conditions */
const run = (conditions: AlertCondition[], start: AlertState = CLEAR_STATE) => {
  let state = start;
  let ids = ZERO;
  const kinds: string[] = [];
  conditions.forEach((c, i) => {
    const result = stepAlertState(state, {
      deviceId: DEVICE,
      category: 'temperature',
      condition: c,
      at: BASE_TIME + i * TICK_MS,
      clearDebounceTicks: THREE,
      nextId: () => {
        ids += ONE;
        return `id-${ids}`;
      },
    });
    state = result.state;
    if (result.transition !== null) kinds.push(result.transition.kind);
  });
  return { state, kinds, ids };
};

describe('stepAlertState', () => {
  it('should stay clear while the condition is absent', () => {
    const { state, kinds } = run([condition(null, 50), condition(null, 60)]);
    expect(state).toBe(CLEAR_STATE);
    expect(kinds).toEqual([]);
  });

  it('should raise once and deduplicate while the condition persists', () => {
    const { state, kinds, ids } = run([condition('warning', 81), condition('warning', 83), condition('warning', 82)]);
    expect(kinds).toEqual(['raised']);
    expect(ids).toBe(ONE);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.alert).toEqual({
      id: 'id-1',
      deviceId: DEVICE,
      category: 'temperature',
      severity: 'warning',
      message: 'value 82',
      value: 82,
      threshold: 80,
      firstSeen: BASE_TIME,
      lastSeen: BASE_TIME + 2 * TICK_MS,
      occurrenceCount: 3,
    });
  });

  it('should escalate in place and never de-escalate while active', () => {
    const { state, kinds } = run([
      condition('warning', 85),
      condition('critical', 92, 90),
      condition('warning', 86),
    ]);
    expect(kinds).toEqual(['raised', 'escalated']);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.alert.id).toBe('id-1');
    expect(state.alert.severity).toBe('critical');
    expect(state.alert.threshold).toBe(90);
    expect(state.alert.message).toBe('value 92');
    expect(state.alert.value).toBe(86);
  });

  it('should clear only after the debounce streak', () => {
    const twoQuiet = run([condition('warning', 85), condition(null, 70), condition(null, 70)]);
    expect(twoQuiet.state.kind).toBe('active');
    expect(twoQuiet.kinds).toEqual(['raised']);

    const threeQuiet = run([condition('warning', 85), condition(null, 70), condition(null, 70), condition(null, 70)]);
    expect(threeQuiet.state).toBe(CLEAR_STATE);
    expect(threeQuiet.kinds).toEqual(['raised', 'cleared']);
  });

  it('should reset the clear streak when the condition returns', () => {
    const { state, kinds } = run([
      condition('warning', 85),
      condition(null, 70),
      condition(null, 70),
      condition('warning', 84),
      condition(null, 70),
      condition(null, 70),
    ]);
    expect(kinds).toEqual(['raised']);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.clearStreak).toBe(2);
    expect(state.alert.occurrenceCount).toBe(2);
  });

  it('should raise a fresh alert with a new id after clearing', () => {
    const { state, kinds, ids } = run([
      condition('warning', 85),
      condition(null, 70),
      condition(null, 70),
      condition(null, 70),
      condition('critical', 95, 90),
    ]);
    expect(kinds).toEqual(['raised', 'cleared', 'raised']);
    expect(ids).toBe(2);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.alert.id).toBe('id-2');
    expect(state.alert.occurrenceCount).toBe(ONE);
  });

  it('should count an info condition toward clearing a warning alert', () => {
    const { state, kinds } = run([
      condition('warning', 85),
      condition('info', 75),
      condition('info', 75),
      condition('info', 75),
      condition('info', 75),
    ]);
    expect(kinds).toEqual(['raised', 'cleared', 'raised']);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.alert.severity).toBe('info');
    expect(state.alert.id).toBe('id-2');
  });

  it('should keep an info alert open while the info condition persists', () => {
    const { state, kinds } = run([condition('info', 60), condition('info', 61), condition('warning', 81)]);
    expect(kinds).toEqual(['raised', 'escalated']);
    if (state.kind !== 'active') throw new Error('Expected an active alert');
    expect(state.alert.occurrenceCount).toBe(THREE);
  });

  it('should not mutate the previous state', () => {
    const first = run([condition('warning', 85)]).state;
    const snapshot = JSON.stringify(first);
    run([condition('critical', 95, 90)], first);
    expect(JSON.stringify(first)).toBe(snapshot);
  });
});

describe('evaluateAlertConditions', () => {
  it('should compare with greater-or-equal at each threshold', () => {
    const atWarn = conditionsFor([makeSample({ temperatureC: 80 })]);
    expect(atWarn.temperature.severity).toBe('warning');
    expect(atWarn.temperature.message).toBe('Temperature 80.0°C is above the warning level of 80.0°C');

    const atCrit = conditionsFor([makeSample({ temperatureC: 90 })]);
    expect(atCrit.temperature.severity).toBe('critical');
    expect(atCrit.temperature.threshold).toBe(90);

    const below = conditionsFor([makeSample({ temperatureC: 79.9 })]);
    expect(below.temperature.severity).toBeNull();
  });

  it('should measure power against the board limit', () => {
    const conditions = conditionsFor([makeSample({ powerWatts: 270 })]);
    expect(conditions.power.severity).toBe('warning');
    expect(conditions.power.value).toBeCloseTo(90);
    expect(conditions.power.message).toBe('Power draw 270.0W is 90.0% of the board limit (threshold 85.0%)');
  });

  it('should raise an info memory alert for a suspected leak below warn', () => {
    const conditions = conditionsFor([makeSample({ memoryUsed: 8 * GIB })], { ...calmMemory, leakSuspected: true });
    expect(conditions.memory.severity).toBe('info');
    expect(conditions.memory.message).toBe('Memory usage at 50.0% is growing steadily; possible leak (heuristic)');
  });

  it('should flag throttling as a warning', () => {
    const conditions = conditionsFor([makeSample({ throttled: true })]);
    expect(conditions.throttling.severity).toBe('warning');
    expect(conditions.temperature.severity).toBeNull();
  });

  it('should warn when temperature rises more than the limit inside the heating window', () => {
    const heating = conditionsFor([sampleAt(0, { temperatureC: 50 }), sampleAt(10, { temperatureC: 70 })]);
    expect(heating.heating.severity).toBe('warning');
    expect(heating.heating.value).toBe(20);
    expect(heating.heating.message).toBe('Temperature rising rapidly (+20.0°C in 300s)');
    expect(heating.temperature.severity).toBeNull();

    const atLimit = conditionsFor([sampleAt(0, { temperatureC: 50 }), sampleAt(10, { temperatureC: 65 })]);
    expect(atLimit.heating.severity).toBeNull();
  });

  it('should ignore samples older than the heating window', () => {
    const conditions = conditionsFor([
      sampleAt(0, { temperatureC: 40 }),
      sampleAt(301, { temperatureC: 60 }),
      sampleAt(302, { temperatureC: 60 }),
    ]);
    expect(conditions.heating.value).toBe(ZERO);
    expect(conditions.heating.severity).toBeNull();
  });

  it('should warn on repeated power spikes', () => {
    // +21 W per tick for `rises` ticks, flat afterwards
    const ramp = (rises: number) =>
      Array.from({ length: 11 }, (_, i) => sampleAt(i, { powerWatts: 100 + 21 * Math.min(i, rises) }));

    const unstable = conditionsFor(ramp(8));
    expect(unstable.powerSpikes.severity).toBe('warning');
    expect(unstable.powerSpikes.value).toBe(8);
    expect(unstable.powerSpikes.message).toBe('Detected 8 power spikes; check power supply stability');

    expect(conditionsFor(ramp(7)).powerSpikes.severity).toBeNull();
  });
});

describe('AlertEngine', () => {
  const hot = (temperatureC: number) => conditionsFor([makeSample({ temperatureC })]);

  it('should leave state untouched until a plan is committed', () => {
    const engine = new AlertEngine({ deviceId: DEVICE });
    const plan = engine.plan(hot(85), BASE_TIME);
    expect(plan.transitions.map((t) => t.kind)).toEqual(['raised']);
    expect(engine.activeAlerts()).toEqual([]);
    engine.commit(plan);
    expect(engine.activeAlerts().map((a) => a.id)).toEqual(['gpu0-temperature-1']);
  });

  it('should number alert ids per device across categories', () => {
    const engine = new AlertEngine({ deviceId: DEVICE });
    engine.commit(engine.plan(hot(85), BASE_TIME));
    const conditions = conditionsFor([makeSample({ temperatureC: 85, throttled: true })]);
    engine.commit(engine.plan(conditions, BASE_TIME + TICK_MS));
    expect(engine.activeAlerts().map((a) => a.id)).toEqual(['gpu0-temperature-1', 'gpu0-throttling-2']);
  });

  it('should keep a bounded transition history, newest first', () => {
    const engine = new AlertEngine({ deviceId: DEVICE, clearDebounceTicks: ONE, historyLimit: 2 });
    engine.commit(engine.plan(hot(85), BASE_TIME));
    engine.commit(engine.plan(hot(95), BASE_TIME + TICK_MS));
    engine.commit(engine.plan(hot(50), BASE_TIME + 2 * TICK_MS));
    expect(engine.recentTransitions(10).map((t) => t.kind)).toEqual(['cleared', 'escalated']);
    expect(engine.recentTransitions(ONE).map((t) => t.kind)).toEqual(['cleared']);
    expect(engine.recentTransitions(ZERO)).toEqual([]);
  });
});

describe('AlertEngine - memory alert with a suspected leak', () => {
  const memoryAt = (usedPct: number, leakSuspected: boolean) =>
    conditionsFor([makeSample({ memoryUsed: (MEMORY_TOTAL * usedPct) / 100 })], { ...calmMemory, leakSuspected });

  it('should clear the warning once usage stays below warn and then report the leak', () => {
    const engine = new AlertEngine({ deviceId: DEVICE });
    engine.commit(engine.plan(memoryAt(85, true), BASE_TIME));
    for (let i = ONE; i <= THREE; i++) {
      engine.commit(engine.plan(memoryAt(75, true), BASE_TIME + i * TICK_MS));
    }
    expect(engine.activeAlerts()).toEqual([]);

    engine.commit(engine.plan(memoryAt(75, true), BASE_TIME + 4 * TICK_MS));
    const [leak] = engine.activeAlerts();
    expect(leak?.severity).toBe('info');
    expect(leak?.message).toBe('Memory usage at 75.0% is growing steadily; possible leak (heuristic)');
    expect(engine.recentTransitions(10).map((t) => [t.kind, t.alert.severity])).toEqual([
      ['raised', 'info'],
      ['cleared', 'warning'],
      ['raised', 'warning'],
    ]);
  });

  it('should refresh the message while usage stays above warn', () => {
    const engine = new AlertEngine({ deviceId: DEVICE });
    engine.commit(engine.plan(memoryAt(85, false), BASE_TIME));
    engine.commit(engine.plan(memoryAt(88, true), BASE_TIME + TICK_MS));
    const [memory] = engine.activeAlerts();
    expect(memory?.message).toBe('Memory usage 88.0% is above the warning level of 80.0%');
    expect(memory?.value).toBeCloseTo(88);
  });
});
