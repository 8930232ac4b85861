import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { Services } from '../services/index.js';
import { setupDatasetRoutes } from './dataset-routes.js';
import { setupPromptRoutes } from './prompt-routes.js';
import { setupScoreRoutes } from './score-routes.js';
import { setupTraceRoutes } from './trace-routes.js';

export interface AppOptions {
  services: Services;
  /** Default page size of list endpoints */
  perPage?: number;
  // Security: Allowed CORS origins (default: localhost dev servers)
  allowedOrigins?: string[];
}

export interface ServerConfig extends AppOptions {
  port: number;
  // Security: Network binding (default: localhost only)
  bindAddress?: string;
}

const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:5173',
  'http://127.0.0.1:5173',
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];

/**
 * Build the Hono app with every API route mounted. Used directly by tests
 * through app.request().
 */
export function createApp(options: AppOptions): Hono {
  const { services } = options;
  const allowedOrigins = options.allowedOrigins ?? DEFAULT_ALLOWED_ORIGINS;
  const app = new Hono();

  // CORS configuration - restrict to allowed origins only
  app.use('*', cors({
    origin: (origin) => {
      // Allow requests with no origin (same-origin, curl, etc.)
      if (!origin) return '*';
      if (allowedOrigins.includes(origin)) {
        return origin;
      }
      console.warn(`[CORS] Blocked request from origin: ${origin}`);
      return null;
    },
    allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }));

  app.get('/api/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  setupPromptRoutes(app, { prompts: services.prompts });
  setupDatasetRoutes(app, { services, perPage: options.perPage ?? 25 });
  setupScoreRoutes(app, { scores: services.scores });
  setupTraceRoutes(app, { traces: services.traces, scores: services.scores });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export class PromptLabServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private port: number;
  private bindAddress: string;

  constructor(config: ServerConfig) {
    this.port = config.port;
    this.bindAddress = config.bindAddress ?? '127.0.0.1';
    this.app = createApp(config);
  }

  start(): void {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.bindAddress,
    });

    console.log(`[Server] HTTP server listening on http://${this.bindAddress}:${this.port}`);
    if (this.bindAddress === '127.0.0.1' || this.bindAddress === 'localhost') {
      console.log('[Server] Security: Accepting connections from localhost only');
    } else if (this.bindAddress === '0.0.0.0') {
      console.warn('[Server] Security: Accepting connections from all interfaces - ensure proper authentication is configured');
    }
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;

    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
