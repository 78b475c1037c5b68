/**
 * Bounded in-memory store of the most recent log entries
 */

import { LogEntry } from '../types';

export const DEFAULT_BUFFER_CAPACITY = 1000;

/**
 * Fixed-capacity ring of entries in insertion order.
 *
 * When full, a push evicts the oldest entry before appending; pushes never
 * fail or wait.
 */
export class EventBuffer {
  private readonly slots: Array<LogEntry | undefined>;
  private start = 0;
  private count = 0;

  constructor(readonly capacity: number = DEFAULT_BUFFER_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<LogEntry | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Appends an entry, evicting the oldest one when at capacity
   *
   * @returns The evicted entry, if any
   */
  push(entry: LogEntry): LogEntry | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.start + this.count) % this.capacity] = entry;
      this.count++;
      return undefined;
    }

    const evicted = this.slots[this.start];
    this.slots[this.start] = entry;
    this.start = (this.start + 1) % this.capacity;
    return evicted;
  }

  /**
   * Most recent entries in chronological order
   *
   * @param limit - Maximum number of entries; defaults to everything held
   */
  snapshot(limit: number = this.count): LogEntry[] {
    const take = Math.max(0, Math.min(Math.floor(limit), this.count));
    const result: LogEntry[] = [];
    for (let i = this.count - take; i < this.count; i++) {
      const entry = this.slots[(this.start + i) % this.capacity];
      if (entry) {
        result.push(entry);
      }
    }
    return result;
  }
}
