import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import { createServer, type Server } from 'http';
import { createCollectionRoutes, type CollectionService } from '../collections/index.js';

export interface ServerConfig {
  port: number;
  collectionService: CollectionService;
}

/**
 * HTTP transport for the collection service.
 */
export class CollectionsServer {
  private app: Express;
  private server: Server;
  private port: number;
  private collectionService: CollectionService;

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.collectionService = config.collectionService;

    // Create Express app
    this.app = express();

    this.app.use(cors({
      origin: '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }));
    this.app.use(express.json());

    // Create HTTP server
    this.server = createServer(this.app);

    this.setupRoutes();
  }

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.use('/api/collections', createCollectionRoutes(this.collectionService));
    console.log('[Server] Collection routes enabled');
  }

  /**
   * Bound port once started (differs from the configured one when that is 0).
   */
  get listeningPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(this.port, '0.0.0.0', () => {
        console.log(`[Server] HTTP server listening on http://0.0.0.0:${this.listeningPort}`);
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
      // Idle keep-alive sockets would otherwise hold close() open
      this.server.closeAllConnections();
    });
  }
}
