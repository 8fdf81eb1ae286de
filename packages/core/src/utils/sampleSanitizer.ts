/**
 * Ingestion-time sample cleaning.
 * Out-of-range values are clamped and non-finite values replaced, with a
 * SampleWarning recorded for every field that changed.
 */
import type { SampleWarning } from '../registryTypes.js';
import type { MetricSample, NumericSampleField } from '../types.js';

const ZERO = 0;
const PERCENT = 100;
const MAX_TEMPERATURE_C = 150;

interface FieldBounds {
  min: number;
  max: number;
}

const FIELD_BOUNDS: Record<Exclude<NumericSampleField, 'timestamp' | 'memoryUsed'>, FieldBounds> = {
  utilizationPct: { min: ZERO, max: PERCENT },
  fanPct: { min: ZERO, max: PERCENT },
  temperatureC: { min: ZERO, max: MAX_TEMPERATURE_C },
  memoryTotal: { min: ZERO, max: Number.MAX_SAFE_INTEGER },
  powerWatts: { min: ZERO, max: Number.MAX_VALUE },
  coreClockMhz: { min: ZERO, max: Number.MAX_VALUE },
  memClockMhz: { min: ZERO, max: Number.MAX_VALUE },
};

/** Result of cleaning one sample */
export interface SanitizedSample {
  sample: MetricSample;
  warnings: SampleWarning[];
}

const clamp = (value: number, { min, max }: FieldBounds): number => Math.min(max, Math.max(min, value));

/**
 * Clean a raw sample.
 * @param previous last accepted sample for the device; supplies replacements
 *   for non-finite values and the lower bound for the timestamp
 * @param fallbackTimestamp receipt time, used when the timestamp is not finite
 */
export const sanitizeSample = (
  raw: MetricSample,
  previous: MetricSample | undefined,
  fallbackTimestamp: number
): SanitizedSample => {
  const warnings: SampleWarning[] = [];

  const accept = (field: NumericSampleField, bounds: FieldBounds): number => {
    const received = raw[field];
    const fallback = field === 'timestamp' ? fallbackTimestamp : (previous?.[field] ?? ZERO);
    const finite = Number.isFinite(received) ? received : fallback;
    const applied = clamp(finite, bounds);
    if (applied !== received) warnings.push({ field, received, applied });
    return applied;
  };

  const memoryTotal = accept('memoryTotal', FIELD_BOUNDS.memoryTotal);
  const memoryUsed = accept('memoryUsed', {
    min: ZERO,
    max: memoryTotal > ZERO ? memoryTotal : Number.MAX_SAFE_INTEGER,
  });
  const timestamp = accept('timestamp', {
    min: previous?.timestamp ?? Number.NEGATIVE_INFINITY,
    max: Number.POSITIVE_INFINITY,
  });

  const sample: MetricSample = {
    timestamp,
    utilizationPct: accept('utilizationPct', FIELD_BOUNDS.utilizationPct),
    memoryUsed,
    memoryTotal,
    temperatureC: accept('temperatureC', FIELD_BOUNDS.temperatureC),
    powerWatts: accept('powerWatts', FIELD_BOUNDS.powerWatts),
    fanPct: accept('fanPct', FIELD_BOUNDS.fanPct),
    coreClockMhz: accept('coreClockMhz', FIELD_BOUNDS.coreClockMhz),
    memClockMhz: accept('memClockMhz', FIELD_BOUNDS.memClockMhz),
    throttled: raw.throttled === true,
  };

  return { sample: Object.freeze(sample), warnings };
};
