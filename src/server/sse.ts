/**
 * Event-stream framing
 */

import { LogEntry } from '../types';

/** Comment frame holding idle connections open; clients ignore it */
export const SSE_KEEPALIVE = ': keepalive\n\n';

export const SSE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  'Connection': 'keep-alive',
  'Access-Control-Allow-Origin': '*',
};

export function formatSseEvent(entry: LogEntry): string {
  return `data: ${JSON.stringify(entry)}\n\n`;
}
