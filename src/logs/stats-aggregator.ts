/**
 * Process-lifetime counters derived from observed log entries
 */

import { LogEntry, Stats } from '../types';

type Counter = keyof Stats;

/**
 * Keywords that bump each counter (case-insensitive substring match on the message).
 * One entry can bump several counters.
 */
const COUNTER_KEYWORDS: ReadonlyArray<readonly [Counter, readonly string[]]> = [
  ['requests', ['request']],
  ['blocked', ['blocked', 'denied', 'reject']],
  ['captchas', ['captcha']],
];

/**
 * Returns the counters a message contributes to
 */
export function matchCounters(message: string): Counter[] {
  const lower = message.toLowerCase();
  return COUNTER_KEYWORDS
    .filter(([, keywords]) => keywords.some(keyword => lower.includes(keyword)))
    .map(([counter]) => counter);
}

/**
 * Owns the dashboard Stats. Counters only ever grow; there is no reset.
 */
export class StatsAggregator {
  private readonly counters: Stats = {
    requests: 0,
    blocked: 0,
    captchas: 0,
  };

  /**
   * Accounts for one entry. Callers observe each entry exactly once.
   */
  observe(entry: LogEntry): void {
    for (const counter of matchCounters(entry.message)) {
      this.counters[counter] += 1;
    }
  }

  /**
   * Copy of the current counters, safe to hand to serializers
   */
  snapshot(): Stats {
    return { ...this.counters };
  }
}
