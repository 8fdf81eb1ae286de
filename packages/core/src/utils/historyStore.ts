/**
 * Per-device sample history.
 * Each device gets one ring buffer; every tracked metric is read from the same
 * samples, so capacity applies uniformly to all metrics of a device.
 */
import type { DeviceId, MetricPoint, MetricSample, TrackedMetric } from '../types.js';
import { RingBuffer } from './ringBuffer.js';

const ZERO = 0;
const ONE = 1;
const PERCENT = 100;

export const DEFAULT_HISTORY_CAPACITY = 300;

/** Window selection: the newest `count` samples, or samples within `durationMs` of the newest */
export type WindowRange = { count: number } | { durationMs: number };

/** Lazy, restartable, read-only view over a metric window */
export type MetricWindow = Iterable<MetricPoint>;

/** Ticket returned by append, used to undo it */
export interface AppendReceipt {
  deviceId: DeviceId;
  evicted: MetricSample | undefined;
  created: boolean;
}

/** Read one tracked metric from a sample */
export const readMetric = (sample: MetricSample, metric: TrackedMetric): number => {
  if (metric === 'memoryUsedPct') {
    return sample.memoryTotal > ZERO ? (sample.memoryUsed / sample.memoryTotal) * PERCENT : ZERO;
  }
  return sample[metric];
};

const EMPTY_WINDOW: MetricWindow = { [Symbol.iterator]: () => [][Symbol.iterator]() };

const findStartIndex = (buffer: RingBuffer<MetricSample>, range: WindowRange): number => {
  if ('count' in range) {
    return Math.max(ZERO, buffer.length - Math.max(ZERO, Math.floor(range.count)));
  }
  const newest = buffer.newest();
  if (newest === undefined) return buffer.length;
  const cutoff = newest.timestamp - range.durationMs;
  let start = buffer.length;
  // Timestamps are non-decreasing, so scan back from the newest
  while (start > ZERO) {
    const candidate = buffer.at(start - ONE);
    if (candidate === undefined || candidate.timestamp < cutoff) break;
    start -= ONE;
  }
  return start;
};

export class HistoryStore {
  private readonly buffers = new Map<DeviceId, RingBuffer<MetricSample>>();
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_HISTORY_CAPACITY) {
    this.capacity = capacity;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /** O(1); evicts the oldest sample when the device's buffer is full */
  append(deviceId: DeviceId, sample: MetricSample): AppendReceipt {
    let buffer = this.buffers.get(deviceId);
    const created = buffer === undefined;
    if (buffer === undefined) {
      buffer = new RingBuffer<MetricSample>(this.capacity);
      this.buffers.set(deviceId, buffer);
    }
    return { deviceId, evicted: buffer.push(sample), created };
  }

  /** Undo an append, restoring the sample it evicted */
  revert(receipt: AppendReceipt): void {
    const buffer = this.buffers.get(receipt.deviceId);
    if (buffer === undefined) return;
    buffer.revertPush(receipt.evicted);
    if (receipt.created && buffer.length === ZERO) {
      this.buffers.delete(receipt.deviceId);
    }
  }

  size(deviceId: DeviceId): number {
    return this.buffers.get(deviceId)?.length ?? ZERO;
  }

  latest(deviceId: DeviceId): MetricSample | undefined {
    return this.buffers.get(deviceId)?.newest();
  }

  /**
   * Ordered view over the most recent matching samples of one metric.
   * Unknown or empty devices yield an empty sequence.
   */
  window(deviceId: DeviceId, metric: TrackedMetric, range: WindowRange): MetricWindow {
    const buffer = this.buffers.get(deviceId);
    if (buffer === undefined) return EMPTY_WINDOW;
    return {
      *[Symbol.iterator]() {
        for (const sample of buffer.iterateFrom(findStartIndex(buffer, range))) {
          yield { timestamp: sample.timestamp, value: readMetric(sample, metric) };
        }
      },
    };
  }

  /** Lazy view over every retained sample of a device, oldest first */
  view(deviceId: DeviceId): Iterable<MetricSample> {
    const buffer = this.buffers.get(deviceId);
    if (buffer === undefined) return [];
    return { [Symbol.iterator]: () => buffer.iterateFrom(ZERO) };
  }

  /** Full retained contents, oldest first */
  samples(deviceId: DeviceId): MetricSample[] {
    return this.buffers.get(deviceId)?.toArray() ?? [];
  }
}
