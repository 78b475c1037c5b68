/**
 * Shared types for the dashboard daemon
 */

/** Verbosity of the process logger */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Severity assigned to an operator-facing log entry */
export type EntryLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * A classified log line as shown to dashboard viewers.
 * Field names are part of the HTTP contract.
 */
export interface LogEntry {
  readonly time: string;   // Wall-clock "HH:MM:SS"
  readonly level: EntryLevel;
  readonly source: string;
  readonly message: string;
}

export type SourceKind = 'journal' | 'file';

export interface SourceDescriptor {
  name: string;
  kind: SourceKind;
  target: string; // Unit name for journal sources, path (or glob) for file sources
}

export interface Stats {
  requests: number;
  blocked: number;
  captchas: number;
}

export type ServiceState = 'running' | 'stopped' | 'unknown';

/**
 * Body of GET /api/status
 */
export interface DashboardStatus {
  services: Record<string, ServiceState>;
  mirror_onion: string | null;
  backend_onion: string;
  stats: Stats;
  start_time: number;
}

export interface DashboardConfig {
  host: string;
  port: number;
  dashboardDir: string;
  services: string[];
  sources: SourceDescriptor[];
  mirrorHostnameFile: string;
  backendOnion: string;
  bufferCapacity: number;
  historyLimit: number;
  keepaliveMs: number;
  pollIntervalMs: number;
  statusTimeoutMs: number;
  logLevel: LogLevel;
}

export type OutputFormat = 'pretty' | 'json';
