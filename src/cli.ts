#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { DashboardConfig, OutputFormat, SourceDescriptor } from './types';
import { logger, isLogLevel } from './logger';
import {
  CONFIG_ENV_VAR,
  ConfigError,
  ConfigResult,
  defaultConfig,
  loadConfigFile,
  mergeConfig,
  parseSourceSpec,
} from './config';
import { serveCommand } from './commands/serve';
import { statusCommand } from './commands/status';

/**
 * Options accepted by every subcommand that needs a configuration
 */
export interface ConfigOptions {
  config?: string;
  logLevel?: string;
  host?: string;
  port?: number;
  dashboardDir?: string;
  bufferCapacity?: number;
  backendOnion?: string;
  source?: string[];
}

/**
 * Parses an integer option value
 * @throws InvalidArgumentError if the value is not an integer
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Builds the effective configuration: defaults, then the config file
 * (--config or $WATCHPOST_CONFIG), then command-line flags
 */
export function resolveConfig(
  options: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env
): ConfigResult | ConfigError {
  let base = defaultConfig();

  const configPath = options.config ?? env[CONFIG_ENV_VAR];
  if (configPath) {
    try {
      const loaded = loadConfigFile(configPath, base);
      if (!loaded.success) {
        return loaded;
      }
      base = loaded.config;
    } catch (error) {
      return {
        success: false,
        reason: `Failed to read config file: ${error instanceof Error ? error.message : error}`,
      };
    }
  }

  const overrides: Partial<Record<keyof DashboardConfig, unknown>> = {};
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;
  if (options.host !== undefined) overrides.host = options.host;
  if (options.port !== undefined) overrides.port = options.port;
  if (options.dashboardDir !== undefined) overrides.dashboardDir = options.dashboardDir;
  if (options.bufferCapacity !== undefined) overrides.bufferCapacity = options.bufferCapacity;
  if (options.backendOnion !== undefined) overrides.backendOnion = options.backendOnion;

  if (options.source && options.source.length > 0) {
    const sources: SourceDescriptor[] = [];
    for (const spec of options.source) {
      const parsed = parseSourceSpec(spec);
      if (!parsed.success) {
        return { success: false, reason: `Invalid source ${parsed.invalidSource}: ${parsed.reason}` };
      }
      sources.push(parsed.source);
    }
    overrides.sources = sources;
  }

  return mergeConfig(base, overrides);
}

function configOrExit(options: ConfigOptions): DashboardConfig {
  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    logger.error(`Invalid log level: ${options.logLevel}`);
    process.exit(1);
  }

  const resolved = resolveConfig(options);
  if (!resolved.success) {
    logger.error(resolved.reason);
    process.exit(1);
  }

  logger.setLevel(resolved.config.logLevel);
  logger.debug('Configuration:', JSON.stringify(resolved.config, null, 2));
  return resolved.config;
}

export const program = new Command();

program
  .name('watchpost')
  .description('Operator dashboard with live service health and log streaming')
  .version('0.1.0');

program
  .command('serve')
  .description('Tail service logs and serve the dashboard over HTTP')
  .option('-c, --config <path>', `YAML config file (default: $${CONFIG_ENV_VAR})`)
  .option('--log-level <level>', 'Log level: trace, debug, info, warn, error')
  .option('--host <host>', 'Address to bind')
  .option('-p, --port <port>', 'Port to listen on', parseInteger)
  .option('--dashboard-dir <dir>', 'Directory holding the dashboard assets')
  .option('--buffer-capacity <count>', 'Number of recent log entries kept in memory', parseInteger)
  .option('--backend-onion <address>', 'Backend onion address reported by /api/status')
  .option(
    '-s, --source <name=kind:target>',
    'Log source (can be specified multiple times, replaces configured sources). Kind is journal or file',
    collect
  )
  .action(async (options: ConfigOptions) => {
    const config = configOrExit(options);
    await serveCommand(config);
  });

program
  .command('status')
  .description('Print service states and onion addresses once')
  .option('-c, --config <path>', `YAML config file (default: $${CONFIG_ENV_VAR})`)
  .option('--log-level <level>', 'Log level: trace, debug, info, warn, error')
  .option('--format <format>', 'Output format: pretty, json', 'pretty')
  .action(async (options: ConfigOptions & { format: string }) => {
    if (options.format !== 'pretty' && options.format !== 'json') {
      logger.error(`Invalid format: ${options.format}. Must be one of: pretty, json`);
      process.exit(1);
    }
    const format: OutputFormat = options.format;
    const config = configOrExit(options);
    await statusCommand(config, { format });
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
