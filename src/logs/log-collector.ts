/**
 * Starts one background tailing task per configured log source
 */

import { glob, hasMagic } from 'glob';
import { SourceDescriptor } from '../types';
import { logger } from '../logger';
import { tailSource } from './source-tailer';
import { LogPipeline } from './log-pipeline';

export interface CollectorOptions {
  /** Shutdown signal; aborting stops every tailer */
  signal?: AbortSignal;
  /** Forwarded to file tailers */
  pollIntervalMs?: number;
}

/**
 * Expands file sources whose target is a glob pattern into one source per
 * matching file. Journal sources and plain paths are returned untouched.
 */
export async function expandSources(sources: SourceDescriptor[]): Promise<SourceDescriptor[]> {
  const expanded: SourceDescriptor[] = [];

  for (const source of sources) {
    if (source.kind !== 'file' || !hasMagic(source.target)) {
      expanded.push(source);
      continue;
    }

    let matches: string[] = [];
    try {
      matches = await glob(source.target, { nodir: true });
    } catch (error) {
      logger.debug(`Error expanding ${source.target}:`, error);
    }

    if (matches.length === 0) {
      logger.warn(`No files match ${source.target} for source ${source.name}`);
      continue;
    }

    for (const match of matches.sort()) {
      expanded.push({ ...source, target: match });
    }
  }

  return expanded;
}

/**
 * Pumps one source into the pipeline until the tailer ends.
 * Resolves, never rejects: a failed source is simply absent from the stream.
 */
export async function runCollector(
  source: SourceDescriptor,
  pipeline: LogPipeline,
  options: CollectorOptions = {}
): Promise<void> {
  const lines = tailSource(source, {
    signal: options.signal,
    pollIntervalMs: options.pollIntervalMs,
    onAttached: () => logger.debug(`Tailing ${source.kind} ${source.target} as ${source.name}`),
  });

  try {
    for await (const line of lines) {
      pipeline.ingest(line, source.name);
    }
  } catch (error) {
    logger.warn(`Collector for ${source.name} stopped:`, error);
  }

  logger.debug(`Stopped tailing ${source.target} (${source.name})`);
}

/**
 * Expands the configured sources and launches a collector for each
 *
 * @returns The running collector tasks, settled once their tailers end
 */
export async function startLogCollectors(
  sources: SourceDescriptor[],
  pipeline: LogPipeline,
  options: CollectorOptions = {}
): Promise<Array<Promise<void>>> {
  const expanded = await expandSources(sources);
  logger.debug(`Starting ${expanded.length} log collector(s)`);
  return expanded.map(source => runCollector(source, pipeline, options));
}
