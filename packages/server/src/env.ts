import {
  DEFAULT_FALLBACK_PORT,
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_NOTIFICATION_MIN_INTERVAL_MS,
  DEFAULT_PRIMARY_PORT,
  DEFAULT_SAMPLE_INTERVAL_MS,
  DEFAULT_SIMULATED_DEVICES,
} from './constants.js';

const RADIX_DECIMAL = 10;

const parseInteger = (value: string | undefined, defaultValue: number): number => {
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, RADIX_DECIMAL);
  return isNaN(parsed) ? defaultValue : parsed;
};

const parsePort = parseInteger;

export const env = {
  port: parsePort(process.env.PORT, DEFAULT_PRIMARY_PORT),
  fallbackPort: parsePort(process.env.FALLBACK_PORT, DEFAULT_FALLBACK_PORT),
  logLevel: process.env.LOG_LEVEL ?? 'info',
  isTest: process.env.NODE_ENV === 'test',
  /** Optional JSON file with threshold and scoring overrides */
  settingsPath: process.env.SETTINGS_PATH,
  sampleIntervalMs: parseInteger(process.env.SAMPLE_INTERVAL_MS, DEFAULT_SAMPLE_INTERVAL_MS),
  /** 0 disables the simulated sample source */
  simulatedDevices: parseInteger(process.env.SIMULATED_DEVICES, DEFAULT_SIMULATED_DEVICES),
  notificationMinIntervalMs: parseInteger(
    process.env.NOTIFICATION_MIN_INTERVAL_MS,
    DEFAULT_NOTIFICATION_MIN_INTERVAL_MS
  ),
  historyCapacity: parseInteger(process.env.HISTORY_CAPACITY, DEFAULT_HISTORY_CAPACITY),
};
