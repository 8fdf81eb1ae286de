/**
 * Alert lifecycle types.
 *
 * Each (device, category) pair runs a small state machine:
 * clear -> active -> clear, with in-place escalation while active.
 */
import type { DeviceId } from './types.js';

export type AlertCategory = 'temperature' | 'power' | 'memory' | 'throttling' | 'heating' | 'powerSpikes';

export type AlertSeverity = 'info' | 'warning' | 'critical';

/**
 * A deduplicated alert. While the underlying condition persists the same
 * alert is updated rather than re-created.
 */
export interface Alert {
  id: string;
  deviceId: DeviceId;
  category: AlertCategory;
  severity: AlertSeverity;
  message: string;
  /** Value that last met the condition */
  value: number;
  /** Threshold the value was compared against */
  threshold: number;
  /** Sample timestamp of the first tick that met the condition */
  firstSeen: number;
  /** Sample timestamp of the latest tick that met the condition */
  lastSeen: number;
  occurrenceCount: number;
}

/** Result of evaluating one category against one sample */
export interface AlertCondition {
  /** null when the condition does not hold on this tick */
  severity: AlertSeverity | null;
  value: number;
  threshold: number;
  message: string;
}

/** Alert state for one (device, category) pair */
export type AlertState =
  | { kind: 'clear' }
  | {
      kind: 'active';
      alert: Alert;
      /** Consecutive ticks the condition has been absent */
      clearStreak: number;
    };

export type AlertTransitionKind = 'raised' | 'escalated' | 'cleared';

/** Emitted to subscribers whenever an alert changes lifecycle state */
export interface AlertTransition {
  kind: AlertTransitionKind;
  alert: Alert;
  /** Sample timestamp of the tick that produced the transition */
  at: number;
}

/** Listener for alert transitions */
export type AlertListener = (transition: AlertTransition) => void;

/** Unsubscribe function returned by subscribe */
export type Unsubscribe = () => void;
