/**
 * Simulated sample source: mock devices whose metrics drift slowly, fed into
 * the registry on a fixed interval. Stands in for vendor polling.
 */
import type { DeviceId, DeviceRegistryInstance, MetricSample } from '@gpu-vitals/core';

import { logger } from './logger.js';

const ZERO = 0;
const HALF = 0.5;
const PERCENT = 100;
const GIB = 1024 * 1024 * 1024;

const MOCK_MEMORY_TOTAL = 8 * GIB;
const MAX_POWER_WATTS = 300;
const THROTTLE_TEMPERATURE_C = 88;

interface DriftRule {
  min: number;
  max: number;
  /** Largest change per tick in either direction */
  step: number;
}

const DRIFT: Record<'utilizationPct' | 'memoryUsedPct' | 'temperatureC' | 'powerWatts' | 'fanPct', DriftRule> = {
  utilizationPct: { min: 0, max: 100, step: 4 },
  memoryUsedPct: { min: 5, max: 98, step: 0.5 },
  temperatureC: { min: 35, max: 95, step: 0.8 },
  powerWatts: { min: 30, max: MAX_POWER_WATTS, step: 6 },
  fanPct: { min: 20, max: 100, step: 2 },
};

interface SimulatedState {
  utilizationPct: number;
  memoryUsedPct: number;
  temperatureC: number;
  powerWatts: number;
  fanPct: number;
}

const INITIAL_STATE: SimulatedState = {
  utilizationPct: 45,
  memoryUsedPct: 25,
  temperatureC: 65,
  powerWatts: 150,
  fanPct: 60,
};

export interface SimulatedSourceConfig {
  registry: DeviceRegistryInstance;
  deviceCount: number;
  intervalMs: number;
  /** Uniform random in [0, 1) (default: Math.random) */
  random?: () => number;
  now?: () => number;
}

export interface SimulatedSourceInstance {
  start: () => void;
  stop: () => void;
  /** Produce one sample per device immediately */
  tickOnce: () => void;
  deviceIds: () => DeviceId[];
}

export const simulatedDeviceId = (index: number): DeviceId => `sim-${index}`;

const drift = (value: number, rule: DriftRule, random: () => number): number => {
  const next = value + (random() - HALF) * 2 * rule.step;
  return Math.min(rule.max, Math.max(rule.min, next));
};

export const toSample = (state: SimulatedState, timestamp: number): MetricSample => ({
  timestamp,
  utilizationPct: state.utilizationPct,
  memoryUsed: Math.round((MOCK_MEMORY_TOTAL * state.memoryUsedPct) / PERCENT),
  memoryTotal: MOCK_MEMORY_TOTAL,
  temperatureC: state.temperatureC,
  powerWatts: state.powerWatts,
  fanPct: state.fanPct,
  coreClockMhz: 1500,
  memClockMhz: 7000,
  throttled: state.temperatureC >= THROTTLE_TEMPERATURE_C,
});

class SimulatedSource implements SimulatedSourceInstance {
  private readonly config: SimulatedSourceConfig;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly states = new Map<DeviceId, SimulatedState>();
  private timer: NodeJS.Timeout | null = null;

  constructor(config: SimulatedSourceConfig) {
    this.config = config;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
    for (let i = ZERO; i < config.deviceCount; i++) {
      this.states.set(simulatedDeviceId(i), { ...INITIAL_STATE });
    }
  }

  deviceIds(): DeviceId[] {
    return Array.from(this.states.keys());
  }

  private advance(state: SimulatedState): SimulatedState {
    return {
      utilizationPct: drift(state.utilizationPct, DRIFT.utilizationPct, this.random),
      memoryUsedPct: drift(state.memoryUsedPct, DRIFT.memoryUsedPct, this.random),
      temperatureC: drift(state.temperatureC, DRIFT.temperatureC, this.random),
      powerWatts: drift(state.powerWatts, DRIFT.powerWatts, this.random),
      fanPct: drift(state.fanPct, DRIFT.fanPct, this.random),
    };
  }

  tickOnce(): void {
    const timestamp = this.now();
    for (const [deviceId, state] of this.states) {
      const next = this.advance(state);
      this.states.set(deviceId, next);
      try {
        this.config.registry.tick(deviceId, toSample(next, timestamp));
      } catch (error) {
        logger.error('Simulated tick failed', {
          deviceId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      this.tickOnce();
    }, this.config.intervalMs);
    logger.info('Simulated sample source started', {
      devices: this.config.deviceCount,
      intervalMs: this.config.intervalMs,
    });
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Simulated sample source stopped');
  }
}

export const createSimulatedSource = (config: SimulatedSourceConfig): SimulatedSourceInstance =>
  new SimulatedSource(config);
