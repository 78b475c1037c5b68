/**
 * Process-wide state owned by the composition root and handed to every
 * component that reads or mutates it
 */

import { DashboardConfig } from './types';
import { BroadcastHub, EventBuffer, LogPipeline, StatsAggregator } from './logs';

export interface DashboardState {
  readonly stats: StatsAggregator;
  readonly hub: BroadcastHub;
  readonly pipeline: LogPipeline;
  /** Epoch milliseconds at process start */
  readonly startTime: number;
}

export function createDashboardState(
  config: Pick<DashboardConfig, 'bufferCapacity'>,
  startTime: number = Date.now()
): DashboardState {
  const stats = new StatsAggregator();
  const hub = new BroadcastHub(new EventBuffer(config.bufferCapacity), {
    maxPending: config.bufferCapacity,
  });

  return {
    stats,
    hub,
    pipeline: new LogPipeline(stats, hub),
    startTime,
  };
}
