/**
 * Rendering of a host status report for the `status` command
 */

import chalk from 'chalk';
import { OutputFormat, ServiceState } from '../types';

export interface StatusReport {
  services: Record<string, ServiceState>;
  mirror_onion: string | null;
  backend_onion: string;
}

const STATE_COLORS: Record<ServiceState, (text: string) => string> = {
  running: chalk.green,
  stopped: chalk.red,
  unknown: chalk.yellow,
};

export function formatStatusJson(report: StatusReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Human-readable report: one line per service, then the onion addresses
 */
export function formatStatusPretty(report: StatusReport, colorize: boolean): string {
  const names = Object.keys(report.services);
  const width = Math.max(0, ...names.map(name => name.length));
  const lines: string[] = [];

  lines.push(colorize ? chalk.bold('Services') : 'Services');
  for (const name of names) {
    const state = report.services[name];
    const label = colorize ? STATE_COLORS[state](state) : state;
    lines.push(`  ${name.padEnd(width)}  ${label}`);
  }

  lines.push('');
  lines.push(`Mirror onion:  ${report.mirror_onion ?? '(unavailable)'}`);
  lines.push(`Backend onion: ${report.backend_onion || '(not configured)'}`);

  return lines.join('\n');
}

export function formatStatus(report: StatusReport, format: OutputFormat, colorize = false): string {
  switch (format) {
    case 'json':
      return formatStatusJson(report);
    case 'pretty':
      return formatStatusPretty(report, colorize);
  }
}
