import { type MetricSample, readMetric } from '@gpu-vitals/core';

import { BYTES_PER_MB } from './constants.js';

const ONE_DECIMAL = 1;
const NO_DECIMALS = 0;

export const HISTORY_CSV_HEADER = [
  'timestamp',
  'utilization_percent',
  'memory_used_mb',
  'memory_usage_percent',
  'temperature_c',
  'power_draw_w',
  'fan_speed_percent',
  'core_clock_mhz',
  'memory_clock_mhz',
  'throttled',
].join(',');

export const toCsvRow = (sample: MetricSample): string =>
  [
    new Date(sample.timestamp).toISOString(),
    sample.utilizationPct.toFixed(ONE_DECIMAL),
    Math.floor(sample.memoryUsed / BYTES_PER_MB).toString(),
    readMetric(sample, 'memoryUsedPct').toFixed(ONE_DECIMAL),
    sample.temperatureC.toFixed(ONE_DECIMAL),
    sample.powerWatts.toFixed(ONE_DECIMAL),
    sample.fanPct.toFixed(NO_DECIMALS),
    Math.round(sample.coreClockMhz).toString(),
    Math.round(sample.memClockMhz).toString(),
    sample.throttled ? 'Yes' : 'No',
  ].join(',');

/** Retained history, oldest first, one row per sample with a trailing newline */
export const historyToCsv = (samples: readonly MetricSample[]): string =>
  [HISTORY_CSV_HEADER, ...samples.map(toCsvRow)].join('\n') + '\n';
