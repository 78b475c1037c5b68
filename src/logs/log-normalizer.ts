/**
 * Normalizer turning raw service log lines into dashboard entries
 *
 * Lines come from heterogeneous sources (journald output, nginx access logs,
 * Tor notices), so classification is a keyword heuristic over the whole line:
 *
 * Oct 18 10:00:02 host tor[812]: [warn] Guard relay unreachable
 *   -> { time: "10:00:02", level: "warn", ... }
 * 127.0.0.1 - - [18/Oct/2026:10:00:03 +0000] "GET / HTTP/1.1" 200 512
 *   -> { time: "10:00:03", level: "info", ... }
 */

import { EntryLevel, LogEntry } from '../types';

/** First HH:MM:SS run anywhere in the line */
const TIME_PATTERN = /(\d{2}:\d{2}:\d{2})/;

/**
 * Keyword lists in priority order: the first level with a matching keyword wins
 */
const LEVEL_KEYWORDS: ReadonlyArray<readonly [EntryLevel, readonly string[]]> = [
  ['error', ['error', 'failed', 'fatal']],
  ['warn', ['warn', 'warning']],
  ['debug', ['debug', 'trace']],
];

/**
 * Formats a date as a local wall-clock "HH:MM:SS" string
 */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(part => String(part).padStart(2, '0'))
    .join(':');
}

/**
 * Extracts the first HH:MM:SS timestamp from a line
 *
 * @returns The timestamp, or null when the line carries none
 */
export function extractTime(line: string): string | null {
  const match = line.match(TIME_PATTERN);
  return match ? match[1] : null;
}

/**
 * Classifies a line by case-insensitive keyword search.
 * Lines matching no keyword are "info".
 */
export function classifyLevel(line: string): EntryLevel {
  const lower = line.toLowerCase();
  for (const [level, keywords] of LEVEL_KEYWORDS) {
    if (keywords.some(keyword => lower.includes(keyword))) {
      return level;
    }
  }
  return 'info';
}

/**
 * Normalizes a raw line from a named source into a log entry
 *
 * @param rawLine - Line as read from the source (may carry a trailing newline)
 * @param source - Source name the line is attributed to
 * @param now - Clock used when the line has no timestamp of its own
 */
export function normalizeLine(rawLine: string, source: string, now: Date = new Date()): LogEntry {
  return Object.freeze({
    time: extractTime(rawLine) ?? formatClock(now),
    level: classifyLevel(rawLine),
    source,
    message: rawLine.trim(),
  });
}

/**
 * Builds an entry attributed to the dashboard itself (connection notices, startup)
 */
export function dashboardEntry(message: string, now: Date = new Date()): LogEntry {
  return Object.freeze({
    time: formatClock(now),
    level: 'info',
    source: 'dashboard',
    message,
  });
}
