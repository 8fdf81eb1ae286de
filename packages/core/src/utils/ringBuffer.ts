/**
 * Fixed-capacity circular buffer.
 * Storage is allocated once; push overwrites the oldest slot when full.
 */

const ZERO = 0;
const ONE = 1;

export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private readonly capacity: number;
  /** Index of the oldest item */
  private head = ZERO;
  private size = ZERO;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < ONE) {
      throw new Error(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get length(): number {
    return this.size;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /**
   * Append an item. Returns the evicted item when the buffer was full.
   */
  push(item: T): T | undefined {
    if (this.size < this.capacity) {
      this.slots[(this.head + this.size) % this.capacity] = item;
      this.size += ONE;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + ONE) % this.capacity;
    return evicted;
  }

  /**
   * Undo the most recent push. `evicted` must be the value that push returned.
   */
  revertPush(evicted: T | undefined): void {
    if (this.size === ZERO) return;
    if (evicted === undefined) {
      this.slots[(this.head + this.size - ONE) % this.capacity] = undefined;
      this.size -= ONE;
      return;
    }
    this.head = (this.head - ONE + this.capacity) % this.capacity;
    this.slots[this.head] = evicted;
  }

  /** Item at position `index` counted from the oldest (0) */
  at(index: number): T | undefined {
    if (index < ZERO || index >= this.size) return undefined;
    return this.slots[(this.head + index) % this.capacity];
  }

  newest(): T | undefined {
    return this.at(this.size - ONE);
  }

  /** Iterate from `start` (inclusive, counted from the oldest) to the newest item */
  *iterateFrom(start: number): Generator<T> {
    for (let i = Math.max(ZERO, start); i < this.size; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) yield item;
    }
  }

  toArray(): T[] {
    return Array.from(this.iterateFrom(ZERO));
  }
}
