/**
 * @fileoverview HTTP server hosting the print API.
 *
 * createApp() builds the Express application (logging, JSON bodies, `/api` routes, JSON 404
 * for unknown API paths, error handler) and is what the integration tests drive. The
 * PrintApiServer wraps it in an http.Server listening on the configured ApiPort.
 *
 * Key exports:
 * - createApp(): Express application for a set of core collaborators
 * - PrintApiServer: lifecycle (start, stop, getStatus)
 */

import * as http from 'http';
import express from 'express';
import { AppError, ErrorCode } from '../utils/error.utils';
import { logInfo } from '../utils/logging';
import { buildRouteDependencies, createAPIRoutes, PrintApiDependencies } from './api-routes';
import { createErrorMiddleware, createNotFoundHandler, createRequestLogger } from './middleware';

const JSON_BODY_LIMIT = '1mb';

export interface PrintApiServerStatus {
  readonly isRunning: boolean;
  readonly host: string;
  readonly port: number;
  readonly url: string;
}

export function createApp(deps: PrintApiDependencies): express.Application {
  const app = express();

  app.use(createRequestLogger());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use('/api', createAPIRoutes(buildRouteDependencies(deps)));
  app.use('/api', createNotFoundHandler());

  // Error handling (must be last)
  app.use(createErrorMiddleware());

  return app;
}

export class PrintApiServer {
  private httpServer: http.Server | null = null;
  private isRunning = false;

  constructor(
    private readonly deps: PrintApiDependencies,
    private readonly port: number,
    private readonly host: string = '0.0.0.0'
  ) {}

  public async start(): Promise<void> {
    if (this.isRunning) {
      logInfo('API', 'API server is already running');
      return;
    }

    const server = http.createServer(createApp(this.deps));
    await this.listen(server);

    this.httpServer = server;
    this.isRunning = true;

    logInfo('API', `Print API listening at ${this.getStatus().url}`);
  }

  public async stop(): Promise<void> {
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.httpServer = null;
      logInfo('API', 'Print API stopped');
    }

    this.isRunning = false;
  }

  public getStatus(): PrintApiServerStatus {
    return {
      isRunning: this.isRunning,
      host: this.host,
      port: this.port,
      url: `http://${this.host === '0.0.0.0' ? 'localhost' : this.host}:${this.port}`
    };
  }

  private listen(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException): void => {
        if (err.code === 'EADDRINUSE') {
          reject(new AppError(
            `Port ${this.port} is already in use. Please choose a different ApiPort.`,
            ErrorCode.NETWORK,
            { port: this.port }
          ));
        } else if (err.code === 'EACCES') {
          reject(new AppError(
            `Access denied to port ${this.port}. Try a port number above 1024.`,
            ErrorCode.NETWORK,
            { port: this.port }
          ));
        } else {
          reject(err);
        }
      };

      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
  }
}
