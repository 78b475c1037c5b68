/**
 * Command handler for `watchpost serve`: wires the pipeline, collectors and HTTP server
 */

import { DashboardConfig } from '../types';
import { logger } from '../logger';
import { createDashboardState, DashboardState } from '../dashboard-state';
import { startLogCollectors } from '../logs';
import { DashboardServer } from '../server/dashboard-server';
import { ServiceMonitor, StatusProbe } from '../status/service-monitor';

/**
 * A started dashboard and the means to shut it down
 */
export interface RunningDashboard {
  state: DashboardState;
  server: DashboardServer;
  port: number;
  /** Stops collectors and sessions, then closes the server */
  shutdown(): Promise<void>;
}

export interface StartDashboardDependencies {
  probe?: StatusProbe;
}

/**
 * Starts collectors and the HTTP server for a configuration
 */
export async function startDashboard(
  config: DashboardConfig,
  deps: StartDashboardDependencies = {}
): Promise<RunningDashboard> {
  const state = createDashboardState(config);
  const controller = new AbortController();

  const collectors = await startLogCollectors(config.sources, state.pipeline, {
    signal: controller.signal,
    pollIntervalMs: config.pollIntervalMs,
  });

  const probe = deps.probe ?? new ServiceMonitor({
    services: config.services,
    mirrorHostnameFile: config.mirrorHostnameFile,
    timeoutMs: config.statusTimeoutMs,
  });

  const server = new DashboardServer(state, probe, {
    host: config.host,
    port: config.port,
    dashboardDir: config.dashboardDir,
    backendOnion: config.backendOnion,
    historyLimit: config.historyLimit,
    keepaliveMs: config.keepaliveMs,
  });

  let port: number;
  try {
    port = await server.start();
  } catch (error) {
    controller.abort();
    await Promise.all(collectors);
    throw error;
  }

  state.pipeline.announce('Dashboard server started');

  let stopping: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopping) {
      controller.abort();
      stopping = server.stop()
        .then(() => Promise.all(collectors))
        .then(() => state.hub.closeAll());
    }
    return stopping;
  };

  return { state, server, port, shutdown };
}

/**
 * Main handler for `watchpost serve`. Runs until SIGINT/SIGTERM.
 */
export async function serveCommand(config: DashboardConfig): Promise<void> {
  let dashboard: RunningDashboard;
  try {
    dashboard = await startDashboard(config);
  } catch (error) {
    logger.error(`Failed to start dashboard: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }

  logger.info(`Tailing ${config.sources.length} configured source(s)`);
  logger.info(`API: http://${config.host}:${dashboard.port}/api/status`);

  const onSignal = (signal: NodeJS.Signals, exitCode: number) => {
    logger.info(`Received ${signal}, shutting down...`);
    dashboard.shutdown().then(
      () => process.exit(exitCode),
      (error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', () => onSignal('SIGINT', 130));
  process.once('SIGTERM', () => onSignal('SIGTERM', 143));
}
