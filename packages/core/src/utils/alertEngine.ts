/**
 * Alert engine for one device.
 *
 * Runs one state machine per category and keeps a bounded history of the
 * transitions it produced. Evaluation is split into plan (pure) and commit so
 * that a tick can be abandoned without touching alert state.
 * The engine never rate-limits; delivery policy belongs to the subscriber.
 */
import type { Alert, AlertCategory, AlertCondition, AlertState, AlertTransition } from '../alertTypes.js';
import type { DeviceId } from '../types.js';
import { ALERT_CATEGORIES } from './alertConditions.js';
import { CLEAR_STATE, stepAlertState } from './alertStateMachine.js';
import { RingBuffer } from './ringBuffer.js';

const ZERO = 0;
const ONE = 1;

export const DEFAULT_CLEAR_DEBOUNCE_TICKS = 3;
export const DEFAULT_ALERT_HISTORY_LIMIT = 100;

/** Pending result of one evaluation, applied with commit */
export interface AlertPlan {
  states: ReadonlyMap<AlertCategory, AlertState>;
  transitions: AlertTransition[];
  activeAlerts: Alert[];
  nextSequence: number;
}

export interface AlertEngineConfig {
  deviceId: DeviceId;
  clearDebounceTicks?: number;
  historyLimit?: number;
}

export class AlertEngine {
  private readonly deviceId: DeviceId;
  private readonly clearDebounceTicks: number;
  private states = new Map<AlertCategory, AlertState>();
  private readonly history: RingBuffer<AlertTransition>;
  private sequence = ZERO;

  constructor(config: AlertEngineConfig) {
    this.deviceId = config.deviceId;
    this.clearDebounceTicks = config.clearDebounceTicks ?? DEFAULT_CLEAR_DEBOUNCE_TICKS;
    this.history = new RingBuffer<AlertTransition>(config.historyLimit ?? DEFAULT_ALERT_HISTORY_LIMIT);
  }

  getState(category: AlertCategory): AlertState {
    return this.states.get(category) ?? CLEAR_STATE;
  }

  /** Compute the next states without applying them */
  plan(conditions: Record<AlertCategory, AlertCondition>, at: number): AlertPlan {
    let nextSequence = this.sequence;
    const states = new Map<AlertCategory, AlertState>();
    const transitions: AlertTransition[] = [];
    const activeAlerts: Alert[] = [];

    for (const category of ALERT_CATEGORIES) {
      const result = stepAlertState(this.getState(category), {
        deviceId: this.deviceId,
        category,
        condition: conditions[category],
        at,
        clearDebounceTicks: this.clearDebounceTicks,
        nextId: () => {
          nextSequence += ONE;
          return `${this.deviceId}-${category}-${nextSequence}`;
        },
      });
      states.set(category, result.state);
      if (result.transition !== null) transitions.push(result.transition);
      if (result.state.kind === 'active') activeAlerts.push(result.state.alert);
    }

    return { states, transitions, activeAlerts, nextSequence };
  }

  commit(plan: AlertPlan): void {
    this.states = new Map(plan.states);
    this.sequence = plan.nextSequence;
    for (const transition of plan.transitions) {
      this.history.push(transition);
    }
  }

  activeAlerts(): Alert[] {
    const alerts: Alert[] = [];
    for (const category of ALERT_CATEGORIES) {
      const state = this.getState(category);
      if (state.kind === 'active') alerts.push(state.alert);
    }
    return alerts;
  }

  /** Most recent transitions, newest first */
  recentTransitions(limit: number): AlertTransition[] {
    return this.history.toArray().reverse().slice(ZERO, Math.max(ZERO, limit));
  }
}
