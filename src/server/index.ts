import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import type { QueryHandler } from '../answering/index.js';
import { createQueryRoutes } from './routes.js';
import { createDocsRoutes, type OpenApiDocument } from './docs.js';
import { errorHandler, notFoundHandler } from './errors.js';

export const SERVICE_NAME = 'LLM System with MongoDB Atlas';
export const SERVICE_VERSION = '3.1.0';

export interface ServerConfig {
  port: number;
  host?: string;
  apiToken: string;
  queryHandler: QueryHandler;
  // Overrides the OpenAPI document read from openapi.json
  openApiDocument?: OpenApiDocument;
}

export class DocumentQAServer {
  private app: Express;
  private server: Server;
  private port: number;
  private host: string;
  private apiToken: string;
  private queryHandler: QueryHandler;
  private openApiDocument?: OpenApiDocument;

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.host = config.host ?? '0.0.0.0';
    this.apiToken = config.apiToken;
    this.queryHandler = config.queryHandler;
    this.openApiDocument = config.openApiDocument;

    // Create Express app
    this.app = express();

    // Enable CORS for all origins
    this.app.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }));
    this.app.use(express.json({ limit: '1mb' }));

    // Create HTTP server
    this.server = createServer(this.app);

    // Setup routes
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/', (_req: Request, res: Response) => {
      res.json({
        message: `${SERVICE_NAME} API`,
        version: SERVICE_VERSION,
        docs: '/docs',
        health: '/health',
      });
    });

    // Health check, polled by the hosting platform
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'healthy', service: SERVICE_NAME });
    });

    this.app.use(createDocsRoutes(this.openApiDocument));
    this.app.use('/api/v1', createQueryRoutes(this.queryHandler, this.apiToken));

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  /**
   * Port actually bound, which differs from the configured one when that was 0.
   */
  getPort(): number {
    const address = this.server.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        console.log(`[Server] HTTP server listening on http://${this.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
