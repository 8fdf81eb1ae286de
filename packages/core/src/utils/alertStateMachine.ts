/**
 * Alert lifecycle for one (device, category) pair.
 *
 *   clear  --condition-->  active
 *   active --condition-->  active (deduplicated; may escalate severity)
 *   active --below warn x clearDebounceTicks--> clear
 *
 * Severity never drops while an alert stays active. An info condition does
 * not hold a warning or critical alert open; it counts toward clearing it and
 * is raised afresh once the stronger alert has closed.
 */
import type {
  Alert,
  AlertCategory,
  AlertCondition,
  AlertSeverity,
  AlertState,
  AlertTransition,
} from '../alertTypes.js';
import type { DeviceId } from '../types.js';

const ZERO = 0;
const ONE = 1;

const SEVERITY_RANK: Record<AlertSeverity, number> = { info: 0, warning: 1, critical: 2 };

export const CLEAR_STATE: AlertState = { kind: 'clear' };

export const isMoreSevere = (candidate: AlertSeverity, current: AlertSeverity): boolean =>
  SEVERITY_RANK[candidate] > SEVERITY_RANK[current];

/** Inputs for a single transition step */
export interface AlertStepInput {
  deviceId: DeviceId;
  category: AlertCategory;
  condition: AlertCondition;
  /** Sample timestamp of the current tick */
  at: number;
  clearDebounceTicks: number;
  /** Called only when a new alert is raised */
  nextId: () => string;
}

/** Next state plus the transition it produced, if any */
export interface AlertStepResult {
  state: AlertState;
  transition: AlertTransition | null;
}

const raise = (input: AlertStepInput, severity: AlertSeverity): AlertStepResult => {
  const { deviceId, category, condition, at } = input;
  const alert: Alert = {
    id: input.nextId(),
    deviceId,
    category,
    severity,
    message: condition.message,
    value: condition.value,
    threshold: condition.threshold,
    firstSeen: at,
    lastSeen: at,
    occurrenceCount: ONE,
  };
  return {
    state: { kind: 'active', alert, clearStreak: ZERO },
    transition: { kind: 'raised', alert, at },
  };
};

const persist = (current: Alert, input: AlertStepInput, severity: AlertSeverity): AlertStepResult => {
  const { condition, at } = input;
  const escalated = isMoreSevere(severity, current.severity);
  const alert: Alert = {
    ...current,
    severity: escalated ? severity : current.severity,
    message: severity === current.severity || escalated ? condition.message : current.message,
    value: condition.value,
    threshold: escalated ? condition.threshold : current.threshold,
    lastSeen: at,
    occurrenceCount: current.occurrenceCount + ONE,
  };
  return {
    state: { kind: 'active', alert, clearStreak: ZERO },
    transition: escalated ? { kind: 'escalated', alert, at } : null,
  };
};

/** Whether the condition keeps an active alert of `current` severity open */
const holdsOpen = (severity: AlertSeverity | null, current: AlertSeverity): severity is AlertSeverity =>
  severity !== null && (severity !== 'info' || current === 'info');

/**
 * Advance one pair's state by one tick. Pure: the previous state is not mutated.
 */
export const stepAlertState = (state: AlertState, input: AlertStepInput): AlertStepResult => {
  const { severity } = input.condition;

  if (state.kind === 'clear') {
    return severity === null ? { state, transition: null } : raise(input, severity);
  }

  if (holdsOpen(severity, state.alert.severity)) {
    return persist(state.alert, input, severity);
  }

  const clearStreak = state.clearStreak + ONE;
  if (clearStreak >= input.clearDebounceTicks) {
    return { state: CLEAR_STATE, transition: { kind: 'cleared', alert: state.alert, at: input.at } };
  }
  return { state: { ...state, clearStreak }, transition: null };
};
