/**
 * Trend statistics over a history window.
 * Every function here is pure: outputs depend only on the points passed in.
 */
import type { MetricTrend, PeakValue, TrendStats } from '../healthTypes.js';
import type { HealthSettings, MetricPoint, MetricSample, TrackedMetric } from '../types.js';
import { readMetric } from './historyStore.js';

const ZERO = 0;
const ONE = 1;
const TWO = 2;
const MS_PER_SECOND = 1000;
const PERCENT = 100;

export const TRACKED_METRICS: readonly TrackedMetric[] = [
  'utilizationPct',
  'memoryUsedPct',
  'temperatureC',
  'powerWatts',
  'fanPct',
  'coreClockMhz',
  'memClockMhz',
];

const EMPTY_TREND: MetricTrend = {
  sampleCount: ZERO,
  mean: ZERO,
  min: ZERO,
  max: ZERO,
  slopePerSecond: ZERO,
  peak: null,
};

/**
 * Least-squares slope of (seconds, value), in units per second.
 * Timestamps are centred before accumulating to keep large epoch values from
 * swamping the sums.
 */
export const leastSquaresSlope = (points: readonly MetricPoint[]): number => {
  const [first] = points;
  if (first === undefined || points.length < TWO) return ZERO;

  let sumT = ZERO;
  let sumV = ZERO;
  for (const { timestamp, value } of points) {
    sumT += (timestamp - first.timestamp) / MS_PER_SECOND;
    sumV += value;
  }
  const meanT = sumT / points.length;
  const meanV = sumV / points.length;

  let covariance = ZERO;
  let varianceT = ZERO;
  for (const { timestamp, value } of points) {
    const dt = (timestamp - first.timestamp) / MS_PER_SECOND - meanT;
    covariance += dt * (value - meanV);
    varianceT += dt * dt;
  }
  return varianceT === ZERO ? ZERO : covariance / varianceT;
};

/** Running maximum; the earliest sample wins ties */
export const findPeak = (points: Iterable<MetricPoint>): PeakValue | null => {
  let peak: PeakValue | null = null;
  for (const { timestamp, value } of points) {
    if (peak === null || value > peak.value) {
      peak = { value, timestamp };
    }
  }
  return peak;
};

/** Mean, min, max, slope and peak over whatever points exist */
export const summarizeMetric = (points: readonly MetricPoint[]): MetricTrend => {
  if (points.length === ZERO) return EMPTY_TREND;

  let sum = ZERO;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const { value } of points) {
    sum += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }

  return {
    sampleCount: points.length,
    mean: sum / points.length,
    min,
    max,
    slopePerSecond: leastSquaresSlope(points),
    peak: findPeak(points),
  };
};

/**
 * Seconds spent at or above `threshold`.
 * A qualifying sample contributes the gap to its predecessor; the first
 * sample of the window has none, so it contributes the gap to its successor.
 */
export const secondsAbove = (points: readonly MetricPoint[], threshold: number): number => {
  let totalMs = ZERO;
  for (let i = ZERO; i < points.length; i++) {
    const point = points[i];
    if (point === undefined || point.value < threshold) continue;
    const neighbour = i === ZERO ? points[ONE] : points[i - ONE];
    if (neighbour === undefined) continue;
    totalMs += Math.abs(point.timestamp - neighbour.timestamp);
  }
  return totalMs / MS_PER_SECOND;
};

/** Number of sample-to-sample increases above `deltaWatts` among the newest `lookback` deltas */
export const countPowerSpikes = (
  points: readonly MetricPoint[],
  deltaWatts: number,
  lookback: number
): number => {
  let spikes = ZERO;
  const firstDelta = Math.max(ONE, points.length - lookback);
  for (let i = firstDelta; i < points.length; i++) {
    const current = points[i];
    const previous = points[i - ONE];
    if (current !== undefined && previous !== undefined && current.value - previous.value > deltaWatts) {
      spikes += ONE;
    }
  }
  return spikes;
};

/** Change from the oldest point within `windowMs` of the newest to the newest */
export const riseOver = (points: readonly MetricPoint[], windowMs: number): number => {
  const newest = points[points.length - ONE];
  if (newest === undefined) return ZERO;
  const cutoff = newest.timestamp - windowMs;
  const oldest = points.find((p) => p.timestamp >= cutoff) ?? newest;
  return newest.value - oldest.value;
};

/** Utilization delivered per watt, or null when not measurable for this sample */
export const efficiencyOf = (sample: MetricSample, minUtilizationPct: number): number | null => {
  if (sample.powerWatts <= ZERO || sample.utilizationPct < minUtilizationPct) return null;
  return sample.utilizationPct / sample.powerWatts;
};

/** Best utilization-per-watt in the window, 0 when never measurable */
export const findBestEfficiency = (samples: readonly MetricSample[], minUtilizationPct: number): number => {
  let best = ZERO;
  for (const sample of samples) {
    const efficiency = efficiencyOf(sample, minUtilizationPct);
    if (efficiency !== null && efficiency > best) best = efficiency;
  }
  return best;
};

const toPoints = (samples: readonly MetricSample[], metric: TrackedMetric): MetricPoint[] =>
  samples.map((sample) => ({ timestamp: sample.timestamp, value: readMetric(sample, metric) }));

/**
 * Trend statistics for every tracked metric.
 * Short windows degrade to fewer data points; an empty window yields zeros.
 */
export const analyzeTrends = (window: Iterable<MetricSample>, settings: HealthSettings): TrendStats => {
  const samples = Array.from(window);
  const { thresholds, scoring } = settings;

  const pointsByMetric = new Map<TrackedMetric, MetricPoint[]>();
  for (const metric of TRACKED_METRICS) {
    pointsByMetric.set(metric, toPoints(samples, metric));
  }
  const pointsOf = (metric: TrackedMetric): MetricPoint[] => pointsByMetric.get(metric) ?? [];

  const powerPctPoints = pointsOf('powerWatts').map(({ timestamp, value }) => ({
    timestamp,
    value: scoring.powerLimitWatts > ZERO ? (value / scoring.powerLimitWatts) * PERCENT : ZERO,
  }));

  const oldest = samples[ZERO];
  const newest = samples[samples.length - ONE];

  return {
    windowSeconds:
      oldest !== undefined && newest !== undefined ? (newest.timestamp - oldest.timestamp) / MS_PER_SECOND : ZERO,
    metrics: {
      utilizationPct: summarizeMetric(pointsOf('utilizationPct')),
      memoryUsedPct: summarizeMetric(pointsOf('memoryUsedPct')),
      temperatureC: summarizeMetric(pointsOf('temperatureC')),
      powerWatts: summarizeMetric(pointsOf('powerWatts')),
      fanPct: summarizeMetric(pointsOf('fanPct')),
      coreClockMhz: summarizeMetric(pointsOf('coreClockMhz')),
      memClockMhz: summarizeMetric(pointsOf('memClockMhz')),
    },
    secondsAboveWarn: {
      temperature: secondsAbove(pointsOf('temperatureC'), thresholds.tempWarn),
      power: secondsAbove(powerPctPoints, thresholds.powerWarn),
      memory: secondsAbove(pointsOf('memoryUsedPct'), thresholds.memWarn),
    },
    powerSpikeCount: countPowerSpikes(
      pointsOf('powerWatts'),
      scoring.powerSpikeDeltaWatts,
      scoring.powerSpikeLookback
    ),
    temperatureRiseC: riseOver(pointsOf('temperatureC'), scoring.rapidHeatingWindowSeconds * MS_PER_SECOND),
    bestEfficiency: findBestEfficiency(samples, scoring.minEfficiencyUtilizationPct),
  };
};
