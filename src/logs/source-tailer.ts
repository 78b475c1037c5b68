/**
 * Tailers producing raw lines from a journal unit or a growing file
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { StringDecoder } from 'string_decoder';
import { setTimeout as sleep } from 'timers/promises';
import execa from 'execa';
import { SourceDescriptor } from '../types';
import { logger } from '../logger';

export const DEFAULT_POLL_INTERVAL_MS = 100;

const READ_CHUNK_BYTES = 64 * 1024;

/**
 * Options shared by all tailers
 */
export interface TailOptions {
  /** Aborting ends the sequence and releases the underlying process or file */
  signal?: AbortSignal;
  /** File tailers: wait between read attempts when no new data is available */
  pollIntervalMs?: number;
  /** Called once the source is attached and new lines will be picked up */
  onAttached?: () => void;
}

/**
 * Follows a systemd unit's journal from now on (no backlog)
 */
export async function* tailJournal(unit: string, options: TailOptions = {}): AsyncGenerator<string> {
  const { signal } = options;
  if (signal?.aborted) {
    return;
  }

  const proc = execa('journalctl', ['-u', unit, '-f', '-n', '0', '--no-pager'], {
    stdin: 'ignore',
    stderr: 'ignore',
  });

  // Settle early so a spawn failure is never an unhandled rejection
  const exited: Promise<unknown> = Promise.resolve(proc).then(
    () => null,
    (error: unknown) => error
  );

  const stop = () => {
    proc.kill('SIGTERM');
  };
  signal?.addEventListener('abort', stop, { once: true });

  try {
    if (proc.stdout) {
      const rl = readline.createInterface({
        input: proc.stdout,
        crlfDelay: Infinity,
      });
      options.onAttached?.();

      for await (const line of rl) {
        yield line;
      }
    }

    const error = await exited;
    if (error && !signal?.aborted) {
      logger.warn(`Journal tailer for ${unit} stopped: ${describeError(error)}`);
    }
  } catch (error) {
    if (!signal?.aborted) {
      logger.warn(`Journal tailer for ${unit} failed: ${describeError(error)}`);
    }
  } finally {
    signal?.removeEventListener('abort', stop);
    proc.kill('SIGTERM');
  }
}

/**
 * Follows a file from its current end, polling for appended data.
 * Truncation (size below the read position) restarts reading at offset 0.
 */
export async function* tailFile(filePath: string, options: TailOptions = {}): AsyncGenerator<string> {
  const { signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  if (signal?.aborted) {
    return;
  }

  let handle: fs.promises.FileHandle;
  let position: number;
  try {
    handle = await fs.promises.open(filePath, 'r');
    position = (await handle.stat()).size;
  } catch (error) {
    logger.warn(`File tailer for ${filePath} could not attach: ${describeError(error)}`);
    return;
  }

  options.onAttached?.();
  const chunk = Buffer.alloc(READ_CHUNK_BYTES);
  // Holds back a multibyte character split across two reads
  let decoder = new StringDecoder('utf8');
  let partial = '';

  try {
    while (!signal?.aborted) {
      const { size } = await handle.stat();
      if (size < position) {
        logger.debug(`${filePath} was truncated, reading from the start`);
        position = 0;
        partial = '';
        decoder = new StringDecoder('utf8');
      }

      const { bytesRead } = await handle.read(chunk, 0, chunk.length, position);
      if (bytesRead === 0) {
        await pause(pollIntervalMs, signal);
        continue;
      }

      position += bytesRead;
      const lines = (partial + decoder.write(chunk.subarray(0, bytesRead))).split('\n');
      partial = lines.pop() ?? '';

      for (const line of lines) {
        yield line.endsWith('\r') ? line.slice(0, -1) : line;
      }
    }
  } catch (error) {
    logger.warn(`File tailer for ${filePath} failed: ${describeError(error)}`);
  } finally {
    await handle.close();
  }
}

/**
 * Tails a source according to its kind
 */
export function tailSource(source: SourceDescriptor, options: TailOptions = {}): AsyncGenerator<string> {
  switch (source.kind) {
    case 'journal':
      return tailJournal(source.target, options);
    case 'file':
      return tailFile(source.target, options);
  }
}

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) {
      throw error;
    }
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return 'shortMessage' in error && typeof error.shortMessage === 'string'
      ? error.shortMessage
      : error.message;
  }
  return String(error);
}
