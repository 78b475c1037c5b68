/**
 * Command handler for `watchpost status`
 */

import { DashboardConfig, OutputFormat } from '../types';
import { ServiceMonitor, StatusProbe } from '../status/service-monitor';
import { formatStatus, StatusReport } from '../status/status-formatter';

export interface StatusCommandOptions {
  format: OutputFormat;
}

/**
 * Collects a one-shot report of service states and onion addresses
 */
export async function collectStatusReport(
  config: Pick<DashboardConfig, 'backendOnion'>,
  probe: StatusProbe
): Promise<StatusReport> {
  const [services, mirrorOnion] = await Promise.all([
    probe.checkServices(),
    probe.readMirrorOnion(),
  ]);

  return {
    services,
    mirror_onion: mirrorOnion,
    backend_onion: config.backendOnion,
  };
}

/**
 * Main handler for `watchpost status`: checks the host once and prints the report
 */
export async function statusCommand(
  config: DashboardConfig,
  options: StatusCommandOptions,
  probe: StatusProbe = new ServiceMonitor({
    services: config.services,
    mirrorHostnameFile: config.mirrorHostnameFile,
    timeoutMs: config.statusTimeoutMs,
  })
): Promise<void> {
  const report = await collectStatusReport(config, probe);
  const colorize = !!(process.stdout.isTTY && options.format === 'pretty');
  console.log(formatStatus(report, options.format, colorize));
}
