/**
 * Turns alert transitions into user notifications.
 *
 * Only warning and critical alerts that are raised or escalated are delivered,
 * and never more than one per `minIntervalMs` across all devices. Everything
 * else is logged at debug level.
 */
import type { AlertSeverity, AlertTransition, DeviceId } from '@gpu-vitals/core';

import { logger } from './logger.js';

export interface Notification {
  title: string;
  message: string;
  severity: AlertSeverity;
  deviceId: DeviceId;
}

export type Notifier = (notification: Notification) => void;

export interface NotificationQueueConfig {
  minIntervalMs: number;
  /** Delivery target (default: a warn-level log line) */
  notifier?: Notifier;
  now?: () => number;
}

export interface NotificationQueueInstance {
  /** Returns true when the transition was delivered */
  handle: (transition: AlertTransition) => boolean;
}

const NOTIFIABLE_SEVERITIES: ReadonlySet<AlertSeverity> = new Set<AlertSeverity>(['warning', 'critical']);

const SEVERITY_TITLES: Record<AlertSeverity, string> = {
  info: 'Info',
  warning: 'Warning',
  critical: 'Critical',
};

const logNotifier: Notifier = ({ title, message, deviceId }) => {
  logger.warn(`${title}: ${message}`, { deviceId });
};

export const isNotifiable = (transition: AlertTransition): boolean =>
  transition.kind !== 'cleared' && NOTIFIABLE_SEVERITIES.has(transition.alert.severity);

export const toNotification = ({ alert }: AlertTransition): Notification => ({
  title: `Health alert - ${SEVERITY_TITLES[alert.severity]} (${alert.deviceId})`,
  message: alert.message,
  severity: alert.severity,
  deviceId: alert.deviceId,
});

class NotificationQueue implements NotificationQueueInstance {
  private readonly minIntervalMs: number;
  private readonly notifier: Notifier;
  private readonly now: () => number;
  private lastSentAt: number | null = null;

  constructor(config: NotificationQueueConfig) {
    this.minIntervalMs = config.minIntervalMs;
    this.notifier = config.notifier ?? logNotifier;
    this.now = config.now ?? Date.now;
  }

  private shouldSend(now: number): boolean {
    return this.lastSentAt === null || now - this.lastSentAt >= this.minIntervalMs;
  }

  handle(transition: AlertTransition): boolean {
    const { alert } = transition;
    if (!isNotifiable(transition)) {
      logger.debug(`Alert ${transition.kind}`, { id: alert.id, severity: alert.severity });
      return false;
    }

    const now = this.now();
    if (!this.shouldSend(now)) {
      logger.debug('Notification suppressed', { id: alert.id, severity: alert.severity });
      return false;
    }

    this.lastSentAt = now;
    this.notifier(toNotification(transition));
    return true;
  }
}

export const createNotificationQueue = (config: NotificationQueueConfig): NotificationQueueInstance =>
  new NotificationQueue(config);
