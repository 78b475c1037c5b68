/**
 * HTTP surface of the dashboard: status, history, live stream and static assets
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { DashboardStatus } from '../types';
import { DashboardState } from '../dashboard-state';
import { StatusProbe } from '../status/service-monitor';
import { logger } from '../logger';
import { SSE_HEADERS } from './sse';
import { StreamingSession } from './streaming-session';
import { serveStatic } from './static-files';

export interface DashboardServerOptions {
  host: string;
  port: number;
  dashboardDir: string;
  backendOnion: string;
  historyLimit: number;
  keepaliveMs: number;
}

export class DashboardServer {
  private server: Server | null = null;
  private readonly sessions = new Set<StreamingSession>();

  constructor(
    private readonly state: DashboardState,
    private readonly probe: StatusProbe,
    private readonly options: DashboardServerOptions
  ) {}

  /** Open live stream sessions */
  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Starts listening
   *
   * @returns The bound port (differs from options.port when that is 0)
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          logger.error('Unhandled request error:', error);
        });
      });
      this.server = server;

      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        const address: AddressInfo | string | null = server.address();
        const port = address && typeof address === 'object' ? address.port : this.options.port;
        logger.success(`Dashboard listening on http://${this.options.host}:${port}/`);
        resolve(port);
      });
    });
  }

  /**
   * Ends every stream session and closes the listener
   */
  async stop(): Promise<void> {
    for (const session of this.sessions) {
      session.stop();
    }
    this.sessions.clear();

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }

    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }

  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    res.setHeader('Access-Control-Allow-Origin', '*');

    if (req.method === 'OPTIONS') {
      res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
      res.statusCode = 204;
      res.end();
      return;
    }

    const path = (req.url || '/').split('?')[0];

    try {
      if (req.method !== 'GET' && req.method !== 'HEAD') {
        return this.sendJson(res, { error: 'Method Not Allowed' }, 405);
      }
      if (path === '/api/status') {
        return this.sendJson(res, await this.collectStatus());
      }
      if (path === '/api/logs/history') {
        return this.sendJson(res, this.state.hub.snapshot(this.options.historyLimit));
      }
      if (path === '/api/logs/stream') {
        if (req.method === 'HEAD') {
          res.writeHead(200, SSE_HEADERS);
          res.end();
          return;
        }
        return await this.handleLogStream(res);
      }
      if (path.startsWith('/api/')) {
        return this.sendJson(res, { error: 'Not Found', path }, 404);
      }

      return await serveStatic(this.options.dashboardDir, path, res);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Request for ${path} failed: ${message}`);
      if (!res.headersSent) {
        this.sendJson(res, { error: 'Internal Server Error', message }, 500);
      } else {
        res.end();
      }
    }
  }

  async collectStatus(): Promise<DashboardStatus> {
    const [services, mirrorOnion] = await Promise.all([
      this.probe.checkServices(),
      this.probe.readMirrorOnion(),
    ]);

    return {
      services,
      mirror_onion: mirrorOnion,
      backend_onion: this.options.backendOnion,
      stats: this.state.stats.snapshot(),
      start_time: this.state.startTime,
    };
  }

  private async handleLogStream(res: ServerResponse): Promise<void> {
    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const session = new StreamingSession(this.state.hub, res, {
      keepaliveMs: this.options.keepaliveMs,
    });
    this.sessions.add(session);

    try {
      await session.run();
    } finally {
      this.sessions.delete(session);
      if (!res.writableEnded) {
        res.end();
      }
    }
  }

  private sendJson(res: ServerResponse, body: unknown, statusCode = 200): void {
    res.statusCode = statusCode;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify(body));
  }
}
