import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const NAMESPACE = 'watchpost';

// One debug instance per level, plus "success" which rides on the info level
const channels = {
  trace: debug(`${NAMESPACE}:trace`),
  debug: debug(`${NAMESPACE}:debug`),
  info: debug(`${NAMESPACE}:info`),
  warn: debug(`${NAMESPACE}:warn`),
  error: debug(`${NAMESPACE}:error`),
  success: debug(`${NAMESPACE}:success`),
};

// Configure debug to output to stderr
debug.log = (...args: unknown[]) => console.error(...args);

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVEL_NAMES.some(name => name === value);
}

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
    this.updateDebugNamespaces();
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.updateDebugNamespaces();
  }

  private updateDebugNamespaces(): void {
    const namespaces = LOG_LEVEL_NAMES
      .filter(name => this.shouldLog(name))
      .map(name => `${NAMESPACE}:${name}`);

    if (this.shouldLog('info')) {
      namespaces.push(`${NAMESPACE}:success`);
    }

    debug.enable(namespaces.join(','));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      channels.trace(chalk.dim(`[TRACE] ${message}`), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      channels.debug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      channels.info(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      channels.warn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      channels.error(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      channels.success(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
