/**
 * Auxiliary HTTP listener
 *
 * Express app exposing the probes and the Prometheus scrape endpoint:
 * - GET /healthz
 * - GET /readyz
 * - GET /metrics
 *
 * @example
 * ```typescript
 * const server = new AuxiliaryHttpServer({ health, telemetry, port: 9100, logger });
 * await server.start();
 * ```
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { HealthRegistry } from './health.js';

export interface AuxiliaryHttpServerOptions {
  health: HealthRegistry;
  telemetry: TelemetryManager;
  port: number;
  host?: string;
  /**
   * Time allowed for in-flight requests on stop before connections are cut (ms, default: 10000)
   */
  stopTimeoutMs?: number;
  logger?: Logger;
}

export class AuxiliaryHttpServer {
  private readonly app: Application;
  private server?: Server;
  private readonly health: HealthRegistry;
  private readonly telemetry: TelemetryManager;
  private readonly port: number;
  private readonly host: string;
  private readonly stopTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: AuxiliaryHttpServerOptions) {
    this.health = options.health;
    this.telemetry = options.telemetry;
    this.port = options.port;
    this.host = options.host ?? '0.0.0.0';
    this.stopTimeoutMs = options.stopTimeoutMs ?? 10000;
    this.logger = options.logger;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  public getApp(): Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger?.trace({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/healthz', (_req: Request, res: Response) => {
      if (this.health.isServing()) {
        res.status(200).type('text/plain').send('OK');
      } else {
        res.status(503).type('text/plain').send('Service Unavailable');
      }
    });

    this.app.get('/readyz', (_req: Request, res: Response) => {
      if (this.health.isServing()) {
        res.status(200).type('text/plain').send('Ready');
      } else {
        res.status(503).type('text/plain').send('Not Ready');
      }
    });

    this.app.get('/metrics', (req: Request, res: Response) => {
      this.telemetry.handleScrape(req, res);
    });

    this.app.use((_req: Request, res: Response) => {
      res.status(404).type('text/plain').send('Not Found');
    });
  }

  /**
   * Bind the listener; resolves once it accepts connections.
   */
  public async start(): Promise<void> {
    if (this.server) {
      throw new Error('HTTP server already started');
    }

    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.port, this.host);
      const onError = (error: Error): void => {
        this.logger?.error({ err: error, port: this.port }, 'HTTP server failed to start');
        this.server = undefined;
        reject(error);
      };
      server.once('error', onError);
      server.once('listening', () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.logger?.error({ err: error }, 'HTTP server error');
        });
        this.logger?.info({ host: this.host, port: this.getPort() }, 'HTTP server listening (metrics, health)');
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Bound port, or the configured one before start.
   */
  public getPort(): number {
    const address = this.server?.address();
    if (address !== null && typeof address === 'object') {
      const info: AddressInfo = address;
      return info.port;
    }
    return this.port;
  }

  /**
   * Stop accepting connections; open ones are cut once the stop timeout passes.
   */
  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      this.logger?.warn('HTTP server not running');
      return;
    }
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger?.warn({ timeoutMs: this.stopTimeoutMs }, 'HTTP server stop timed out, closing connections');
        server.closeAllConnections();
      }, this.stopTimeoutMs);

      server.close((error) => {
        clearTimeout(timer);
        if (error) {
          this.logger?.error({ err: error }, 'Failed to stop HTTP server');
          reject(error);
          return;
        }
        this.logger?.info('HTTP server stopped');
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  public isRunning(): boolean {
    return this.server !== undefined;
  }
}
