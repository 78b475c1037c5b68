/**
 * Up/down checks for the monitored services and hidden-service hostname lookup
 */

import * as fs from 'fs';
import execa from 'execa';
import { ServiceState } from '../types';
import { logger } from '../logger';

export const DEFAULT_STATUS_TIMEOUT_MS = 5000;

/**
 * What the status endpoint needs to know about the host
 */
export interface StatusProbe {
  checkServices(): Promise<Record<string, ServiceState>>;
  readMirrorOnion(): Promise<string | null>;
}

export interface ServiceMonitorOptions {
  services: string[];
  mirrorHostnameFile: string;
  timeoutMs?: number;
}

/**
 * Name a unit is reported under: "redis-server" is shown as "redis"
 */
export function displayName(unit: string): string {
  return unit.replace(/-server$/, '');
}

/**
 * Maps `systemctl is-active` output to a service state.
 * No output at all means systemctl itself could not run.
 */
export function interpretIsActive(stdout: string, timedOut: boolean): ServiceState {
  const state = stdout.trim();
  if (timedOut || state === '') {
    return 'unknown';
  }
  return state === 'active' ? 'running' : 'stopped';
}

export class ServiceMonitor implements StatusProbe {
  private readonly timeoutMs: number;

  constructor(private readonly options: ServiceMonitorOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STATUS_TIMEOUT_MS;
  }

  async checkService(unit: string): Promise<ServiceState> {
    try {
      const result = await execa('systemctl', ['is-active', unit], {
        timeout: this.timeoutMs,
        reject: false,
      });
      return interpretIsActive(result.stdout, result.timedOut);
    } catch (error) {
      logger.debug(`Status check for ${unit} failed:`, error);
      return 'unknown';
    }
  }

  /**
   * Checks every configured unit concurrently
   */
  async checkServices(): Promise<Record<string, ServiceState>> {
    const states = await Promise.all(
      this.options.services.map(async unit => [displayName(unit), await this.checkService(unit)] as const)
    );
    return Object.fromEntries(states);
  }

  /**
   * Reads the hidden-service hostname, or null when the file is unavailable
   */
  async readMirrorOnion(): Promise<string | null> {
    try {
      const content = await fs.promises.readFile(this.options.mirrorHostnameFile, 'utf-8');
      return content.trim() || null;
    } catch (error) {
      logger.debug(`Hostname file ${this.options.mirrorHostnameFile} unavailable:`, error);
      return null;
    }
  }
}
