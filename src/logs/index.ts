/**
 * Log aggregation and streaming pipeline
 */

export { normalizeLine, classifyLevel, extractTime, formatClock, dashboardEntry } from './log-normalizer';
export { StatsAggregator, matchCounters } from './stats-aggregator';
export { EventBuffer, DEFAULT_BUFFER_CAPACITY } from './event-buffer';
export { BroadcastHub, Subscription } from './broadcast-hub';
export type { BroadcastHubOptions } from './broadcast-hub';
export { tailSource, tailJournal, tailFile } from './source-tailer';
export type { TailOptions } from './source-tailer';
export { LogPipeline } from './log-pipeline';
export { startLogCollectors, runCollector, expandSources } from './log-collector';
export type { CollectorOptions } from './log-collector';
