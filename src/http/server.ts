import express from 'express';
import http from 'http';
import logger from '../utils/logger';
import type { KnowledgeHandler } from '../services/knowledge/handler';
import { KnowledgeRouterOptions, createKnowledgeRouter } from './routes';

const log = logger.child({ module: 'HTTP' });

export const API_PREFIX = '/api/knowledge';

export function createApp(handler: KnowledgeHandler, options: KnowledgeRouterOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  app.use(API_PREFIX, createKnowledgeRouter(handler, options));

  app.use((req, res) => {
    res.status(404).json({ success: false, error: `route not found: ${req.method} ${req.path}`, code: 'not_found' });
  });

  return app;
}

export interface KnowledgeServerOptions extends KnowledgeRouterOptions {
  port: number;
  host: string;
}

export class KnowledgeServer {
  private readonly server: http.Server;

  constructor(handler: KnowledgeHandler, private readonly options: KnowledgeServerOptions) {
    this.server = http.createServer(createApp(handler, options));
  }

  /** Resolves with the bound port, which differs from `options.port` when that is 0. */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', onError);
        const port = this.port;
        log.info(`Knowledge API listening at http://${this.options.host}:${port}${API_PREFIX}`);
        resolve(port);
      });
    });
  }

  get port(): number {
    const address = this.server.address();
    return typeof address === 'object' && address !== null ? address.port : this.options.port;
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
