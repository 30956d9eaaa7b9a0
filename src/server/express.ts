/**
 * Express REST API Server
 * Serves the METAR relay endpoint and a health check
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import type { ReportRelay } from '../relay/report-relay.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  /** Allowed origins; `'*'` allows every origin */
  corsOrigins: string | string[];
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private relay: ReportRelay;

  constructor(relay: ReportRelay, config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 3001,
      host: 'localhost',
      corsOrigins: '*',
      ...config,
    };
    this.relay = relay;

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  /** `?station=a&station=b` arrives as an array; only the first value counts */
  private getFirstQueryValue(query: unknown): unknown {
    return Array.isArray(query) ? query[0] : query;
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    this.app.disable('x-powered-by');
    this.app.use(cors({
      origin: this.config.corsOrigins,
    }));
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    // Relay counters
    this.app.get('/api/stats', (_req: Request, res: Response) => {
      res.json(this.relay.getStats());
    });

    // METAR relay
    const handleMetar = async (req: Request, res: Response) => {
      const station = this.getFirstQueryValue(req.query.station);
      const { status, body } = await this.relay.handle(station);
      res.status(status).json(body);
    };
    this.app.get('/api/metar', handleMetar);
    this.app.get('/metar', handleMetar);

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ ok: false, error: 'Not found' });
    });

    // Error handler
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      console.error('API Error:', err);
      res.status(500).json({ ok: false, error: 'Internal server error' });
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }
}
