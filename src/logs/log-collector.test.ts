/**
 * Tests for log-collector module
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { expandSources, runCollector, startLogCollectors } from './log-collector';
import { tailSource, TailOptions } from './source-tailer';
import { LogPipeline } from './log-pipeline';
import { StatsAggregator } from './stats-aggregator';
import { BroadcastHub } from './broadcast-hub';
import { EventBuffer } from './event-buffer';
import { SourceDescriptor } from '../types';
import { logger } from '../logger';

jest.mock('./source-tailer');
jest.mock('../logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const mockedTailSource = tailSource as jest.MockedFunction<typeof tailSource>;
const mockedLogger = logger as jest.Mocked<typeof logger>;

async function* linesOf(lines: string[], failWith?: Error): AsyncGenerator<string> {
  for (const line of lines) {
    yield line;
  }
  if (failWith) {
    throw failWith;
  }
}

describe('log-collector', () => {
  let hub: BroadcastHub;
  let stats: StatsAggregator;
  let pipeline: LogPipeline;

  beforeEach(() => {
    jest.clearAllMocks();
    stats = new StatsAggregator();
    hub = new BroadcastHub(new EventBuffer(50));
    pipeline = new LogPipeline(stats, hub);
  });

  describe('runCollector', () => {
    const source: SourceDescriptor = { name: 'haproxy', kind: 'journal', target: 'haproxy' };

    it('should feed every non-blank line into the pipeline under the source name', async () => {
      mockedTailSource.mockReturnValue(linesOf(['10:00:01 request denied', '', '10:00:02 ok']));

      await runCollector(source, pipeline);

      expect(hub.snapshot().map(entry => [entry.source, entry.message])).toEqual([
        ['haproxy', '10:00:01 request denied'],
        ['haproxy', '10:00:02 ok'],
      ]);
      expect(stats.snapshot()).toEqual({ requests: 1, blocked: 1, captchas: 0 });
    });

    it('should pass the shutdown signal and poll interval to the tailer', async () => {
      mockedTailSource.mockReturnValue(linesOf([]));
      const controller = new AbortController();

      await runCollector(source, pipeline, { signal: controller.signal, pollIntervalMs: 250 });

      expect(mockedTailSource).toHaveBeenCalledWith(source, expect.objectContaining({
        signal: controller.signal,
        pollIntervalMs: 250,
      }));
    });

    it('should log when the tailer attaches', async () => {
      mockedTailSource.mockImplementation((_source: SourceDescriptor, options: TailOptions = {}) => {
        options.onAttached?.();
        return linesOf([]);
      });

      await runCollector(source, pipeline);

      expect(mockedLogger.debug).toHaveBeenCalledWith('Tailing journal haproxy as haproxy');
    });

    it('should resolve and keep earlier lines when the tailer throws', async () => {
      mockedTailSource.mockReturnValue(linesOf(['first line'], new Error('read EIO')));

      await expect(runCollector(source, pipeline)).resolves.toBeUndefined();

      expect(hub.snapshot().map(entry => entry.message)).toEqual(['first line']);
      expect(mockedLogger.warn).toHaveBeenCalledWith('Collector for haproxy stopped:', expect.any(Error));
    });
  });

  describe('expandSources', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'watchpost-glob-'));
      await fs.promises.writeFile(path.join(dir, 'b.log'), '');
      await fs.promises.writeFile(path.join(dir, 'a.log'), '');
      await fs.promises.writeFile(path.join(dir, 'notes.txt'), '');
    });

    afterEach(async () => {
      await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('should expand a glob into one source per matching file', async () => {
      const expanded = await expandSources([
        { name: 'nginx', kind: 'file', target: path.join(dir, '*.log') },
      ]);

      expect(expanded).toEqual([
        { name: 'nginx', kind: 'file', target: path.join(dir, 'a.log') },
        { name: 'nginx', kind: 'file', target: path.join(dir, 'b.log') },
      ]);
    });

    it('should drop a glob with no matches and warn', async () => {
      const pattern = path.join(dir, '*.gz');

      expect(await expandSources([{ name: 'old', kind: 'file', target: pattern }])).toEqual([]);
      expect(mockedLogger.warn).toHaveBeenCalledWith(`No files match ${pattern} for source old`);
    });

    it('should pass journal sources and plain paths through untouched', async () => {
      const sources: SourceDescriptor[] = [
        { name: 'tor', kind: 'journal', target: 'tor' },
        { name: 'ghost', kind: 'file', target: path.join(dir, 'missing.log') },
      ];

      expect(await expandSources(sources)).toEqual(sources);
    });
  });

  describe('startLogCollectors', () => {
    it('should start one collector per source and keep failures isolated', async () => {
      mockedTailSource.mockImplementation((source: SourceDescriptor) =>
        source.name === 'broken'
          ? linesOf([], new Error('spawn ENOENT'))
          : linesOf([`${source.name} request served`])
      );

      const tasks = await startLogCollectors(
        [
          { name: 'broken', kind: 'journal', target: 'broken' },
          { name: 'nginx', kind: 'journal', target: 'nginx' },
          { name: 'tor', kind: 'journal', target: 'tor' },
        ],
        pipeline
      );
      await Promise.all(tasks);

      expect(tasks).toHaveLength(3);
      expect(hub.snapshot().map(entry => entry.message).sort()).toEqual([
        'nginx request served',
        'tor request served',
      ]);
      expect(stats.snapshot().requests).toBe(2);
    });
  });
});
