/**
 * Tests for event-buffer module
 */

import { EventBuffer, DEFAULT_BUFFER_CAPACITY } from './event-buffer';
import { LogEntry } from '../types';

function createEntry(n: number): LogEntry {
  return { time: '10:00:00', level: 'info', source: 'nginx', message: `line ${n}` };
}

function messages(entries: LogEntry[]): string[] {
  return entries.map(entry => entry.message);
}

describe('EventBuffer', () => {
  it('should default to a capacity of 1000', () => {
    expect(new EventBuffer().capacity).toBe(DEFAULT_BUFFER_CAPACITY);
    expect(DEFAULT_BUFFER_CAPACITY).toBe(1000);
  });

  it('should reject capacities that are not positive integers', () => {
    expect(() => new EventBuffer(0)).toThrow('Buffer capacity must be a positive integer, got 0');
    expect(() => new EventBuffer(2.5)).toThrow('Buffer capacity must be a positive integer, got 2.5');
  });

  it('should keep entries in insertion order below capacity', () => {
    const buffer = new EventBuffer(5);
    [1, 2, 3].forEach(n => buffer.push(createEntry(n)));

    expect(buffer.size).toBe(3);
    expect(messages(buffer.snapshot())).toEqual(['line 1', 'line 2', 'line 3']);
  });

  it('should never exceed capacity and keep the most recent entries after overflow', () => {
    const buffer = new EventBuffer(3);

    for (let n = 1; n <= 10; n++) {
      buffer.push(createEntry(n));
      expect(buffer.size).toBeLessThanOrEqual(3);
    }

    expect(messages(buffer.snapshot())).toEqual(['line 8', 'line 9', 'line 10']);
  });

  it('should return the evicted entry on overflow', () => {
    const buffer = new EventBuffer(2);

    expect(buffer.push(createEntry(1))).toBeUndefined();
    expect(buffer.push(createEntry(2))).toBeUndefined();
    expect(buffer.push(createEntry(3))?.message).toBe('line 1');
  });

  describe('snapshot', () => {
    const buffer = new EventBuffer(4);
    [1, 2, 3, 4, 5, 6].forEach(n => buffer.push(createEntry(n)));

    it('should return the most recent entries in chronological order', () => {
      expect(messages(buffer.snapshot(2))).toEqual(['line 5', 'line 6']);
    });

    it('should cap the limit at the number of entries held', () => {
      expect(messages(buffer.snapshot(100))).toEqual(['line 3', 'line 4', 'line 5', 'line 6']);
    });

    it('should return nothing for a zero or negative limit', () => {
      expect(buffer.snapshot(0)).toEqual([]);
      expect(buffer.snapshot(-3)).toEqual([]);
    });

    it('should return a copy', () => {
      const first = buffer.snapshot();
      first.pop();
      expect(buffer.snapshot()).toHaveLength(4);
    });
  });
});
