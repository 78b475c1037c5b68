/**
 * Ingestion path shared by every tailer: normalize, count, store and broadcast
 */

import { LogEntry } from '../types';
import { normalizeLine, dashboardEntry } from './log-normalizer';
import { StatsAggregator } from './stats-aggregator';
import { BroadcastHub } from './broadcast-hub';

export class LogPipeline {
  constructor(
    private readonly stats: StatsAggregator,
    private readonly hub: BroadcastHub,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Ingests one raw line attributed to a source
   *
   * @returns The entry, or null for blank lines which are skipped
   */
  ingest(rawLine: string, source: string): LogEntry | null {
    if (rawLine.trim() === '') {
      return null;
    }

    const entry = normalizeLine(rawLine, source, this.clock());
    this.stats.observe(entry);
    this.hub.push(entry);
    return entry;
  }

  /**
   * Publishes a notice from the dashboard itself. Notices are not counted.
   */
  announce(message: string): LogEntry {
    const entry = dashboardEntry(message, this.clock());
    this.hub.push(entry);
    return entry;
  }
}
