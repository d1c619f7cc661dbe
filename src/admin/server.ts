/**
 * Admin HTTP server on @hono/node-server
 */

import { serve } from '@hono/node-server';
import { Server } from 'node:http';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { createComponentLogger, type RoutewiseLogger } from '../logging/index.js';
import { setupRoutes, type AdminDependencies } from './routes.js';

export interface AdminServerConfig {
  port: number;
  host: string;
  /** Browser origins allowed to call the API; CORS is off when empty */
  corsOrigins: string[];
}

export class AdminServer {
  readonly app: Hono;
  private server: Server | null = null;
  private boundPort: number | null = null;
  private readonly logger: RoutewiseLogger;

  constructor(deps: AdminDependencies, private readonly config: AdminServerConfig) {
    this.logger = deps.logger ?? createComponentLogger('AdminServer');
    this.app = new Hono({ strict: false });

    if (config.corsOrigins.length > 0) {
      this.app.use('*', cors({
        origin: config.corsOrigins,
        allowMethods: ['GET', 'POST', 'PUT', 'DELETE'],
        allowHeaders: ['Content-Type', 'Authorization', 'x-correlation-id'],
      }));
    }

    this.app.route('/', setupRoutes(deps));
  }

  /**
   * Resolves once the socket is listening
   */
  start(): Promise<void> {
    if (this.server) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const server = serve(
        { fetch: this.app.fetch, port: this.config.port, hostname: this.config.host },
        info => {
          this.boundPort = info.port;
          this.logger.info('Admin API listening', { url: this.getURL() });
          resolve();
        }
      );
      // serve() defaults to http.createServer
      if (!(server instanceof Server)) {
        throw new Error('Admin API expects an HTTP/1.1 server');
      }
      server.once('error', (error: Error) => {
        this.server = null;
        this.logger.error('Admin server error', error);
        reject(error);
      });
      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;
    return new Promise<void>((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Admin API stopped');
        resolve();
      });
    });
  }

  getURL(): string {
    return `http://${this.config.host}:${this.boundPort ?? this.config.port}`;
  }
}
