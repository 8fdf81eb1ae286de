import type { HealthScore, HealthSettings, HealthStatus } from '@gpu-vitals/core';

import type { Notifier } from './notificationQueue.js';

export type { SampleRequestBody, ThresholdsUpdateBody } from './schemas.js';

export interface SampleAcceptedResponse {
  success: true;
  deviceId: string;
  /** Tick count of the snapshot this sample produced */
  sequence: number;
  healthScore: HealthScore;
  healthStatus: HealthStatus;
}

export interface SettingsUpdatedResponse {
  success: true;
  settings: HealthSettings;
}

export interface ErrorResponse {
  /** Whether the request was successful */
  success: false;
  /** Error message */
  error: string;
}

export interface ServerConfig {
  /** Primary port to try (default: 3000) */
  primaryPort?: number;
  /** Fallback port if primary is unavailable (default: 3001) */
  fallbackPort?: number;
  /** JSON file with threshold and scoring overrides (default: none) */
  settingsPath?: string;
  /** Samples retained per device (default: 300) */
  historyCapacity?: number;
  /** Expected time between samples, also the simulated source period (default: 1000) */
  sampleIntervalMs?: number;
  /** Number of simulated devices; 0 disables the source (default: 1) */
  simulatedDevices?: number;
  /** Minimum time between two delivered notifications (default: 10000) */
  notificationMinIntervalMs?: number;
  notifier?: Notifier;
}
