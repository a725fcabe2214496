import express, { type Express } from 'express';
import { createServer, type Server as HttpServer } from 'node:http';
import { createRuntime, type PaperGraphRuntime } from '@papergraph/core';
import { parseApiKeys, createAuthMiddleware, API_KEYS_ENV } from './middleware/auth.js';
import { createAskRouter } from './routes/ask.js';
import { createClassifyRouter } from './routes/classify.js';
import { createStatusRouter } from './routes/status.js';
import { createOpenAPISpec } from './openapi.js';

export const API_SERVER_VERSION = '0.1.0';

export interface ApiServerOptions {
  /** Project root containing .papergraph.yaml. */
  readonly rootDir: string;
  /** Port to listen on. Default: 3100 */
  readonly port: number;
  /** Accepted API keys. If not provided, reads from PAPERGRAPH_API_KEYS env var. */
  readonly apiKeys?: ReadonlyArray<string>;
  /** CORS origin. Default: '*' */
  readonly corsOrigin?: string;
  /** An already connected runtime; initialize() then skips config loading. */
  readonly runtime?: PaperGraphRuntime;
}

export class ApiServer {
  private readonly app: Express;
  private readonly rootDir: string;
  private readonly port: number;
  private httpServer: HttpServer | null = null;

  // Populated by the constructor option or by initialize()
  private runtime: PaperGraphRuntime | null;

  constructor(options: ApiServerOptions) {
    this.rootDir = options.rootDir;
    this.port = options.port;
    this.runtime = options.runtime ?? null;

    const apiKeys = options.apiKeys ?? parseApiKeys(process.env[API_KEYS_ENV]);
    const corsOrigin = options.corsOrigin ?? '*';

    this.app = express();

    // --- Global Middleware ---

    this.app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', corsOrigin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-API-Key');
      if (req.method === 'OPTIONS') {
        res.status(204).end();
        return;
      }
      next();
    });

    this.app.use(express.json());

    // --- Unauthenticated Routes ---

    this.app.get('/health', (_req, res) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.get('/api/openapi.json', (_req, res) => {
      res.json(createOpenAPISpec());
    });

    // --- Authenticated Routes ---

    this.app.use('/api/v1', createAuthMiddleware(apiKeys));

    // Deps are resolved at request time so routes see the runtime once initialize() has run
    // eslint-disable-next-line @typescript-eslint/no-this-alias
    const self = this;

    this.app.use(
      '/api/v1/ask',
      createAskRouter({
        get answerer() {
          return self.runtime?.answerer ?? null;
        },
      }),
    );
    this.app.use('/api/v1/classify', createClassifyRouter());
    this.app.use(
      '/api/v1/status',
      createStatusRouter({
        get executor() {
          return self.runtime?.executor ?? null;
        },
        get config() {
          return self.runtime?.config ?? null;
        },
      }),
    );
  }

  /**
   * Load config and connect to the graph. The server still starts when this
   * fails; graph routes then answer 503.
   */
  async initialize(): Promise<void> {
    if (this.runtime) {
      return;
    }

    const runtimeResult = await createRuntime({ rootDir: this.rootDir });
    if (runtimeResult.isErr()) {
      // eslint-disable-next-line no-console
      console.error(`[api-server] ${runtimeResult.error.message}`);
      return;
    }
    this.runtime = runtimeResult.value;
  }

  /**
   * Start listening on the configured port.
   */
  async start(): Promise<void> {
    const httpServer = createServer(this.app);
    this.httpServer = httpServer;

    return new Promise<void>((resolvePromise, reject) => {
      httpServer.on('error', reject);
      httpServer.listen(this.port, () => {
        resolvePromise();
      });
    });
  }

  /**
   * Stop the HTTP server and release the graph connection.
   */
  async close(): Promise<void> {
    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolvePromise, reject) => {
        httpServer.close((closeErr) => {
          if (closeErr) reject(closeErr);
          else resolvePromise();
        });
      });
      this.httpServer = null;
    }

    if (this.runtime) {
      await this.runtime.close();
      this.runtime = null;
    }
  }

  /** Expose Express app for testing with supertest. */
  getApp(): Express {
    return this.app;
  }
}
