import { readFileSync } from 'node:fs';

import {
  DEFAULT_HEALTH_SETTINGS,
  type HealthSettings,
  type HealthSettingsOverrides,
  type Thresholds,
  mergeHealthSettings,
  validateHealthSettings,
} from '@gpu-vitals/core';

import { logger } from './logger.js';
import { settingsFileSchema } from './schemas.js';
import { formatZodError } from './validation.js';

/** Current health settings, swapped whole on every update */
export interface SettingsStoreInstance {
  get: () => HealthSettings;
  /**
   * Apply a partial threshold update.
   * @throws Error when the merged settings are invalid; the current settings are kept
   */
  updateThresholds: (update: Partial<Thresholds>) => HealthSettings;
}

class SettingsStore implements SettingsStoreInstance {
  private current: HealthSettings;

  constructor(overrides: HealthSettingsOverrides) {
    const initial = mergeHealthSettings(overrides, DEFAULT_HEALTH_SETTINGS);
    validateHealthSettings(initial);
    this.current = initial;
  }

  get(): HealthSettings {
    return this.current;
  }

  updateThresholds(update: Partial<Thresholds>): HealthSettings {
    const next = mergeHealthSettings({ thresholds: update }, this.current);
    validateHealthSettings(next);
    this.current = next;
    logger.info('Thresholds updated', { thresholds: next.thresholds });
    return next;
  }
}

export const createSettingsStore = (overrides: HealthSettingsOverrides = {}): SettingsStoreInstance =>
  new SettingsStore(overrides);

/**
 * Read threshold and scoring overrides from a JSON file.
 * @throws Error when the file cannot be read or does not match the settings schema
 */
export const loadSettingsFile = (path: string): HealthSettingsOverrides => {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid settings file ${path}: ${formatZodError(result.error)}`);
  }
  logger.info('Settings loaded', { path });
  return result.data;
};
