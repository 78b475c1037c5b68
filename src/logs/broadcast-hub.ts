/**
 * Fan-out of log entries to every connected viewer
 */

import { LogEntry } from '../types';
import { EventBuffer } from './event-buffer';

export const DEFAULT_MAX_PENDING = 1000;

/**
 * One viewer's private delivery channel.
 *
 * Entries are queued here by the hub and drained by exactly one consumer via
 * `next()`; draining never affects any other subscription.
 */
export class Subscription {
  private readonly pending: LogEntry[] = [];
  private waiter: ((entry: LogEntry | null) => void) | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(readonly id: number, private readonly maxPending: number = DEFAULT_MAX_PENDING) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Entries queued but not yet taken */
  get size(): number {
    return this.pending.length;
  }

  /** Entries discarded because this subscriber fell more than maxPending behind */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Hands an entry to this subscriber. Called by the hub only.
   */
  deliver(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(entry);
      return;
    }

    if (this.pending.length >= this.maxPending) {
      this.pending.shift();
      this.droppedCount++;
    }
    this.pending.push(entry);
  }

  /**
   * Waits for the next entry
   *
   * @param timeoutMs - How long to wait when nothing is queued
   * @returns The entry, or null on timeout or once the subscription is closed
   */
  next(timeoutMs: number): Promise<LogEntry | null> {
    const queued = this.pending.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error(`Subscription ${this.id} already has a pending reader`));
    }

    return new Promise<LogEntry | null>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, timeoutMs);

      this.waiter = (entry) => {
        clearTimeout(timer);
        resolve(entry);
      };
    });
  }

  /**
   * Stops delivery, discards queued entries and releases a waiting reader
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pending.length = 0;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
  }
}

export interface BroadcastHubOptions {
  /** Per-subscriber backlog bound; the subscriber's oldest entry is dropped beyond it */
  maxPending?: number;
}

/**
 * Stores every pushed entry in the bounded history buffer and broadcasts it
 * to all current subscribers. Each subscriber receives each entry pushed after
 * it subscribed, in push order, exactly once.
 */
export class BroadcastHub {
  private readonly subscribers = new Set<Subscription>();
  private readonly maxPending: number;
  private nextId = 1;

  constructor(private readonly buffer: EventBuffer, options: BroadcastHubOptions = {}) {
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  push(entry: LogEntry): void {
    this.buffer.push(entry);
    for (const subscriber of this.subscribers) {
      subscriber.deliver(entry);
    }
  }

  snapshot(limit?: number): LogEntry[] {
    return this.buffer.snapshot(limit);
  }

  subscribe(): Subscription {
    const subscription = new Subscription(this.nextId++, this.maxPending);
    this.subscribers.add(subscription);
    return subscription;
  }

  unsubscribe(subscription: Subscription): void {
    this.subscribers.delete(subscription);
    subscription.close();
  }

  /**
   * Closes every subscription, releasing their readers
   */
  closeAll(): void {
    for (const subscription of this.subscribers) {
      subscription.close();
    }
    this.subscribers.clear();
  }
}
