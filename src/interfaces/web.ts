/**
 * Web Interface
 * Express server for the dashboard page and its JSON API
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createServer as createHttpServer } from 'http';
import type { Server } from 'http';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { extractCatalog, catalogToArray } from '../core/catalog.js';
import { generateCommands } from '../core/commands.js';
import { toPayload } from '../core/config-store.js';
import { ConfigValidationError, errorMessage } from '../core/errors.js';
import { renderDashboard } from './page.js';
import type { ConfigStore } from '../core/config-store.js';
import type { LogSink } from '../core/log-sink.js';
import type { ProductDatabaseLoader } from '../core/product-db.js';
import type { Catalog, ExecuteCommandResult, SupervisorStatus } from '../types/index.js';

export const DEFAULT_BIND_ADDRESS = '0.0.0.0';
export const DEFAULT_KMS_PORT = '1688';

export interface WebInterfaceOptions {
  pageLogLines: number;
  apiLogLines: number;
  pollIntervalMs: number;
}

export interface WebInterfaceDeps {
  configStore: ConfigStore;
  sink: LogSink;
  loadDatabase: ProductDatabaseLoader;
  serviceStatus: () => SupervisorStatus;
  options: WebInterfaceOptions;
  now?: () => Date;
}

// Numbers are accepted for convenience; anything else is rejected
const configField = z.union([z.string(), z.number()]).transform(String);

const ConfigUpdateSchema = z.object({
  ip: configField.optional(),
  port: configField.optional()
});

const ExecuteCommandSchema = z.object({
  command: z.string().optional(),
  product: z.string().optional()
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not catch rejected handler promises itself
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Web Interface with Express
 */
export class WebInterface {
  name = 'web';
  readonly app = express();
  private server: Server = createHttpServer(this.app);
  private readonly now: () => Date;

  constructor(private readonly deps: WebInterfaceDeps) {
    this.now = deps.now ?? (() => new Date());
    this.setupRoutes();
  }

  /**
   * Build the catalog against one config snapshot.
   * A database that cannot be loaded means an empty catalog.
   */
  private async buildCatalog(): Promise<Catalog> {
    const snapshot = this.deps.configStore.get();
    let database: unknown;
    try {
      database = await this.deps.loadDatabase();
    } catch (error) {
      logger.warn('Product database unavailable', { error: errorMessage(error) });
      return new Map();
    }
    return extractCatalog(database, (name, key) => generateCommands(name, key, snapshot));
  }

  private setupRoutes(): void {
    const { configStore, sink, options } = this.deps;

    this.app.use((_req, res, next) => {
      res.setHeader('Cache-Control', 'no-store');
      next();
    });

    // Parse JSON bodies
    this.app.use(express.json());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      res.on('finish', () => {
        logger.debug('Request', { method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start });
      });
      next();
    });

    // Page: status, catalog, recent logs
    this.app.get('/', asyncRoute(async (_req: Request, res: Response) => {
      const [catalog, logs] = await Promise.all([
        this.buildCatalog(),
        sink.tail(options.pageLogLines)
      ]);
      const html = renderDashboard(
        { config: configStore.get(), catalog, logs },
        { pollIntervalMs: options.pollIntervalMs }
      );
      res.type('html').send(html);
    }));

    // API: Log tail for polling
    this.app.get('/api/logs', asyncRoute(async (_req: Request, res: Response) => {
      res.json(await sink.tail(options.apiLogLines));
    }));

    // API: Catalog as JSON
    this.app.get('/api/products', asyncRoute(async (_req: Request, res: Response) => {
      res.json(catalogToArray(await this.buildCatalog()));
    }));

    // API: Supervised service state
    this.app.get('/api/server/status', (_req: Request, res: Response) => {
      res.json(this.deps.serviceStatus());
    });

    // API: Server config
    this.app.get('/api/server/config', (_req: Request, res: Response) => {
      res.json(toPayload(configStore.get()));
    });

    this.app.post('/api/server/config', asyncRoute(async (req: Request, res: Response) => {
      const parsed = ConfigUpdateSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join('.') || 'body';
        const error = new ConfigValidationError(field, `Invalid value for ${field}: ${issue?.message ?? 'unexpected body'}`);
        logger.warn(error.message, { code: error.code });
        res.status(400).json({ error: error.message });
        return;
      }

      const ip = parsed.data.ip ?? DEFAULT_BIND_ADDRESS;
      const port = parsed.data.port ?? DEFAULT_KMS_PORT;
      const updated = await configStore.set(ip, port);
      res.json(toPayload(updated));
    }));

    // API: Record a client command. Audit only; nothing is executed.
    this.app.post('/api/execute_command', asyncRoute(async (req: Request, res: Response) => {
      const parsed = ExecuteCommandSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body' });
        return;
      }

      const command = parsed.data.command ?? '';
      const product = parsed.data.product ?? '';
      if (!command) {
        res.status(400).json({ error: 'No command provided' });
        return;
      }

      const result = `Command executed: ${command}`;
      try {
        await sink.append(
          `[${this.now().toISOString()}] Executing: ${command} for product: ${product}`,
          `[${this.now().toISOString()}] Result: ${result}`
        );
      } catch (error) {
        const message = `Error executing command: ${errorMessage(error)}`;
        logger.error(message);
        res.status(500).json({ error: message });
        return;
      }
      logger.audit.commandRecorded(command, product);

      const body: ExecuteCommandResult = { success: true, command, result, product };
      res.json(body);
    }));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Last resort: a failing handler answers 500 instead of taking the server down
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: 'Invalid JSON body' });
        return;
      }
      logger.error('Request failed', { method: req.method, path: req.path, error: errorMessage(err) });
      if (res.headersSent) {
        res.end();
        return;
      }
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  /**
   * Listen on the given host/port. Resolves with the bound port (useful with port 0).
   */
  async start(port: number, host: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException) => {
        if (err.code === 'EADDRINUSE') {
          logger.error(`Port ${port} is already in use`);
        }
        reject(err);
      };
      this.server.once('error', onError);

      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        logger.info(`Web interface started at http://${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve) => {
      this.server.close(() => {
        logger.info('Web interface stopped');
        resolve();
      });
      this.server.closeAllConnections();
    });
  }
}
