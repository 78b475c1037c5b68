/**
 * Dashboard configuration: defaults, YAML config file and command-line overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { DashboardConfig, SourceDescriptor } from './types';
import { isLogLevel } from './logger';

/** Environment variable naming a config file when --config is not given */
export const CONFIG_ENV_VAR = 'WATCHPOST_CONFIG';

const DEFAULT_SERVICES = ['fortify', 'tor', 'haproxy', 'nginx', 'redis-server'];

export function defaultConfig(): DashboardConfig {
  return {
    host: '0.0.0.0',
    port: 9999,
    dashboardDir: path.join(__dirname, '..', 'dashboard'),
    services: [...DEFAULT_SERVICES],
    sources: [
      { name: 'fortify', kind: 'journal', target: 'fortify' },
      { name: 'tor', kind: 'journal', target: 'tor' },
      { name: 'haproxy', kind: 'journal', target: 'haproxy' },
      { name: 'nginx', kind: 'journal', target: 'nginx' },
      { name: 'redis', kind: 'journal', target: 'redis-server' },
      { name: 'nginx', kind: 'file', target: '/var/log/nginx/access.log' },
    ],
    mirrorHostnameFile: '/var/lib/tor/cerberus_hs/hostname',
    backendOnion: '',
    bufferCapacity: 1000,
    historyLimit: 100,
    keepaliveMs: 1000,
    pollIntervalMs: 100,
    statusTimeoutMs: 5000,
    logLevel: 'info',
  };
}

export interface ConfigResult {
  success: true;
  config: DashboardConfig;
}

export interface ConfigError {
  success: false;
  reason: string;
}

export interface ParseSourceResult {
  success: true;
  source: SourceDescriptor;
}

export interface ParseSourceError {
  success: false;
  invalidSource: string;
  reason: string;
}

/**
 * Parses a command-line source specification of the form name=kind:target
 * @param spec - e.g. "tor=journal:tor" or "nginx=file:/var/log/nginx/access.log"
 */
export function parseSourceSpec(spec: string): ParseSourceResult | ParseSourceError {
  const match = spec.match(/^([^=]+)=([^:]+):(.+)$/);
  if (!match) {
    return { success: false, invalidSource: spec, reason: 'Source must be in format name=kind:target' };
  }

  const [, name, kind, target] = match;
  const checked = validateSource({ name: name.trim(), kind: kind.trim(), target: target.trim() }, spec);
  if (typeof checked === 'string') {
    return { success: false, invalidSource: spec, reason: checked };
  }
  return { success: true, source: checked };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * @returns The source, or a reason it is invalid
 */
function validateSource(value: unknown, label: string): SourceDescriptor | string {
  if (!isRecord(value)) {
    return `Source ${label} must be a mapping with name, kind and target`;
  }
  const { name, kind, target } = value;
  if (!isNonEmptyString(name)) {
    return `Source ${label} needs a non-empty name`;
  }
  if (kind !== 'journal' && kind !== 'file') {
    return `Source ${label} has kind ${String(kind)}; expected journal or file`;
  }
  if (!isNonEmptyString(target)) {
    return `Source ${label} needs a non-empty target`;
  }
  return { name, kind, target };
}

const POSITIVE_INTEGER_KEYS = [
  'bufferCapacity',
  'historyLimit',
  'keepaliveMs',
  'pollIntervalMs',
  'statusTimeoutMs',
] as const;

const STRING_KEYS = ['host', 'dashboardDir', 'mirrorHostnameFile'] as const;

/**
 * Layers raw settings (from a config file or flags) over a base config and
 * validates the result. Unknown keys are rejected.
 */
export function mergeConfig(base: DashboardConfig, raw: unknown): ConfigResult | ConfigError {
  if (raw === undefined || raw === null) {
    return { success: true, config: base };
  }
  if (!isRecord(raw)) {
    return { success: false, reason: 'Configuration must be a mapping of settings' };
  }

  const config: DashboardConfig = { ...base };
  const known = new Set<string>(Object.keys(base));

  for (const key of Object.keys(raw)) {
    if (!known.has(key)) {
      return { success: false, reason: `Unknown setting: ${key}` };
    }
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isNonEmptyString(value)) {
      return { success: false, reason: `${key} must be a non-empty string` };
    }
    config[key] = value;
  }

  if (raw.backendOnion !== undefined) {
    if (typeof raw.backendOnion !== 'string') {
      return { success: false, reason: 'backendOnion must be a string' };
    }
    config.backendOnion = raw.backendOnion.trim();
  }

  if (raw.port !== undefined) {
    const port = raw.port;
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
      return { success: false, reason: 'port must be an integer between 0 and 65535' };
    }
    config.port = port;
  }

  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isPositiveInteger(value)) {
      return { success: false, reason: `${key} must be a positive integer` };
    }
    config[key] = value;
  }

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      return { success: false, reason: 'logLevel must be one of trace, debug, info, warn, error' };
    }
    config.logLevel = raw.logLevel;
  }

  if (raw.services !== undefined) {
    if (!Array.isArray(raw.services) || !raw.services.every(isNonEmptyString)) {
      return { success: false, reason: 'services must be a list of unit names' };
    }
    config.services = raw.services.map(service => service.trim());
  }

  if (raw.sources !== undefined) {
    if (!Array.isArray(raw.sources)) {
      return { success: false, reason: 'sources must be a list' };
    }
    const sources: SourceDescriptor[] = [];
    for (const [index, value] of raw.sources.entries()) {
      const checked = validateSource(value, `#${index + 1}`);
      if (typeof checked === 'string') {
        return { success: false, reason: checked };
      }
      sources.push(checked);
    }
    config.sources = sources;
  }

  return { success: true, config };
}

/**
 * Reads a YAML config file and layers it over the defaults
 * @throws Error if the file doesn't exist or isn't valid YAML
 */
export function loadConfigFile(filePath: string, base: DashboardConfig = defaultConfig()): ConfigResult | ConfigError {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  const result = mergeConfig(base, yaml.load(content));
  if (!result.success) {
    return { success: false, reason: `${filePath}: ${result.reason}` };
  }
  return result;
}
