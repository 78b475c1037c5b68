/**
 * Live log stream for one connected viewer
 */

import { BroadcastHub, Subscription } from '../logs/broadcast-hub';
import { dashboardEntry } from '../logs/log-normalizer';
import { logger } from '../logger';
import { formatSseEvent, SSE_KEEPALIVE } from './sse';

export const DEFAULT_KEEPALIVE_MS = 1000;

export type SessionState = 'connecting' | 'streaming' | 'closed';

/**
 * The writable end of a viewer connection. An http.ServerResponse satisfies it.
 */
export interface SessionTransport {
  readonly destroyed: boolean;
  /** Returns false once the transport's own buffer is full */
  write(chunk: string): boolean;
  once(event: 'close', listener: () => void): unknown;
  once(event: 'drain', listener: () => void): unknown;
}

export interface StreamingSessionOptions {
  /** Idle wait before a keepalive frame is sent */
  keepaliveMs?: number;
  clock?: () => Date;
}

/**
 * Drives connecting -> streaming -> closed for a single viewer.
 *
 * While streaming, each broadcast entry is written as a data frame; an idle
 * wait of keepaliveMs writes a keepalive comment instead. When the transport
 * reports a full buffer, reading pauses until it drains, so a stalled viewer's
 * backlog stays in its bounded subscription. A broken connection or stop()
 * closes the session and unsubscribes it from the hub.
 */
export class StreamingSession {
  private currentState: SessionState = 'connecting';
  private subscription: Subscription | null = null;
  private resumeWriting: (() => void) | null = null;
  private readonly keepaliveMs: number;
  private readonly clock: () => Date;

  constructor(
    private readonly hub: BroadcastHub,
    private readonly transport: SessionTransport,
    options: StreamingSessionOptions = {}
  ) {
    this.keepaliveMs = options.keepaliveMs ?? DEFAULT_KEEPALIVE_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Streams until the connection breaks or stop() is called
   */
  async run(): Promise<void> {
    if (this.currentState !== 'connecting') {
      return;
    }

    const subscription = this.hub.subscribe();
    this.subscription = subscription;
    this.currentState = 'streaming';
    this.transport.once('close', () => this.stop());
    logger.debug(`Stream session ${subscription.id} opened`);

    let frame = formatSseEvent(dashboardEntry('Connected to log stream', this.clock()));

    while (this.currentState === 'streaming') {
      if (!this.send(frame)) {
        await this.waitForDrain();
      }
      if (this.currentState !== 'streaming') {
        break;
      }

      const entry = await subscription.next(this.keepaliveMs);
      frame = entry ? formatSseEvent(entry) : SSE_KEEPALIVE;
    }
  }

  /**
   * Closes the session. Safe to call more than once.
   */
  stop(): void {
    if (this.currentState === 'closed') {
      return;
    }
    this.currentState = 'closed';
    this.resumeWriting?.();

    if (this.subscription) {
      this.hub.unsubscribe(this.subscription);
      logger.debug(`Stream session ${this.subscription.id} closed`);
    }
  }

  /**
   * @returns false when the transport asked the writer to wait for 'drain'
   */
  private send(chunk: string): boolean {
    if (this.transport.destroyed) {
      this.stop();
      return true;
    }

    try {
      return this.transport.write(chunk);
    } catch (error) {
      logger.debug('Stream write failed, closing session:', error);
      this.stop();
      return true;
    }
  }

  private waitForDrain(): Promise<void> {
    if (this.currentState !== 'streaming') {
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      const release = () => {
        this.resumeWriting = null;
        resolve();
      };
      this.resumeWriting = release;
      this.transport.once('drain', release);
    });
  }
}
