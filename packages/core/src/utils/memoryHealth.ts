/**
 * Memory health heuristics over the memory-usage history.
 *
 * Leak signal: the newest third of the window averages at least `leakRatio`
 * times the oldest third, and most deltas are non-decreasing.
 * Fragmentation proxy: volatility of consecutive deltas weighted by how full
 * memory is. Neither is ground truth; results are flagged heuristic.
 */
import type { MemoryHealth } from '../healthTypes.js';
import type { MetricPoint, ScoringConfig } from '../types.js';
import { leastSquaresSlope } from './trendAnalyzer.js';

const ZERO = 0;
const ONE = 1;
const THREE = 3;
const PERCENT = 100;
const FULL_CONFIDENCE_DELTAS = 60;

type MemoryHeuristicConfig = Pick<
  ScoringConfig,
  'leakRatio' | 'leakMonotonicFraction' | 'leakMinSamples' | 'fragmentationDeltaCeilingPct'
>;

const mean = (values: readonly number[]): number => {
  if (values.length === ZERO) return ZERO;
  let sum = ZERO;
  for (const value of values) sum += value;
  return sum / values.length;
};

const consecutiveDeltas = (values: readonly number[]): number[] => {
  const deltas: number[] = [];
  for (let i = ONE; i < values.length; i++) {
    const current = values[i];
    const previous = values[i - ONE];
    if (current !== undefined && previous !== undefined) deltas.push(current - previous);
  }
  return deltas;
};

const populationStdDev = (values: readonly number[]): number => {
  if (values.length === ZERO) return ZERO;
  const avg = mean(values);
  let sumSquares = ZERO;
  for (const value of values) sumSquares += (value - avg) * (value - avg);
  return Math.sqrt(sumSquares / values.length);
};

/** Sustained growth: newest third vs oldest third, plus a mostly non-decreasing trend */
export const detectLeak = (values: readonly number[], config: MemoryHeuristicConfig): boolean => {
  if (values.length < Math.max(THREE, config.leakMinSamples)) return false;

  const third = Math.floor(values.length / THREE);
  const oldestMean = mean(values.slice(ZERO, third));
  const newestMean = mean(values.slice(values.length - third));
  const grew = oldestMean > ZERO ? newestMean >= oldestMean * config.leakRatio : newestMean > ZERO;
  if (!grew) return false;

  const deltas = consecutiveDeltas(values);
  const nonDecreasing = deltas.filter((delta) => delta >= ZERO).length;
  return nonDecreasing / deltas.length >= config.leakMonotonicFraction;
};

/** 0-100; high delta volatility at high mean usage scores highest */
export const fragmentationPressure = (values: readonly number[], deltaCeilingPct: number): number => {
  const deltas = consecutiveDeltas(values);
  if (deltas.length === ZERO || deltaCeilingPct <= ZERO) return ZERO;
  const volatility = Math.min(ONE, populationStdDev(deltas) / deltaCeilingPct);
  const occupancy = Math.min(ONE, Math.max(ZERO, mean(values) / PERCENT));
  return Math.round(volatility * occupancy * PERCENT);
};

/**
 * Analyze the memoryUsedPct window.
 */
export const analyzeMemoryHealth = (
  window: Iterable<MetricPoint>,
  config: MemoryHeuristicConfig
): MemoryHealth => {
  const points = Array.from(window);
  const values = points.map((point) => point.value);
  const deltaCount = Math.max(ZERO, values.length - ONE);

  return {
    leakSuspected: detectLeak(values, config),
    fragmentationPressure: fragmentationPressure(values, config.fragmentationDeltaCeilingPct),
    usageTrendSlope: leastSquaresSlope(points),
    heuristic: true,
    confidence: Math.min(ONE, deltaCount / FULL_CONFIDENCE_DELTAS),
  };
};
