/**
 * API Server
 *
 * Express HTTP surface of the gateway:
 * - GET  /health
 * - GET  /model
 * - GET  /model/:name   lifecycle status
 * - POST /model/:name   forwarded to the active worker (held while none is)
 * - PUT  /model/:name   new artifact upload (raw body)
 * - GET  /supervisor/*  pass-through to the supervisor's web UI
 */

import express, {
  type Application,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import {
  SwapError,
  createNotFoundError,
  httpStatusFor,
  toSwapError,
  zodErrorToSwapError,
} from '../api/errors.js';
import type { ArtifactStore } from '../core/artifact-store.js';
import type { ModelRegistry } from '../core/model-registry.js';
import type { RequestRouter } from '../core/request-router.js';
import type { WorkerRequest } from '../types/lifecycle.js';
import { ModelNameSchema } from '../types/schemas/config.js';
import { lazyLog } from '../utils/logger-helpers.js';

export interface ApiServerConfig {
  host: string;
  port: number;
  /** Upper bound for PUT bodies and forwarded POST bodies (bytes) */
  maxArtifactBytes: number;
  corsOrigin: string;
  /** Base URL of the supervisor's web UI for /supervisor */
  supervisorWebUrl: string;
  /** Timeout for /supervisor pass-through requests (ms) */
  proxyTimeoutMs?: number;
}

export interface ApiServerDependencies {
  registry: ModelRegistry;
  router: RequestRouter;
  store: ArtifactStore;
  logger?: Logger;
}

const PROXY_HEADER_SKIP = new Set([
  'content-encoding',
  'content-length',
  'transfer-encoding',
  'connection',
]);

/**
 * Flatten node's incoming header map into single string values.
 */
export function toHeaderRecord(headers: Request['headers']): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[name] = value;
    } else if (Array.isArray(value)) {
      record[name] = value.join(', ');
    }
  }
  return record;
}

function bodyOf(req: Request): Buffer {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) ? body : Buffer.alloc(0);
}

function isPayloadTooLarge(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.too.large'
  );
}

const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/**
 * @example
 * ```typescript
 * const server = new ApiServer({ registry, router, store, logger }, config);
 * await server.start();
 * ```
 */
export class ApiServer {
  private readonly app: Application;
  private readonly config: ApiServerConfig;
  private readonly registry: ModelRegistry;
  private readonly router: RequestRouter;
  private readonly store: ArtifactStore;
  private readonly logger?: Logger;
  private server?: Server;

  constructor(dependencies: ApiServerDependencies, config: ApiServerConfig) {
    this.registry = dependencies.registry;
    this.router = dependencies.router;
    this.store = dependencies.store;
    this.logger = dependencies.logger;
    this.config = config;

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  public getApp(): Application {
    return this.app;
  }

  /**
   * Start listening. Port 0 binds an ephemeral port; see `url()`.
   */
  public async start(): Promise<void> {
    const { host, port } = this.config;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        this.logger?.info({ url: this.url() }, 'API server started');
        resolve();
      });
      server.on('error', (error) => {
        this.logger?.error({ error }, 'Server error');
        reject(error);
      });
      this.server = server;
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          this.logger?.error({ error }, 'Failed to stop server');
          reject(error);
          return;
        }
        this.logger?.info('API server stopped');
        this.server = undefined;
        resolve();
      });
      server.closeIdleConnections();
    });
  }

  /**
   * Base URL the server listens on, or null when not started.
   */
  public url(): string | null {
    const address = this.server?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    const info: AddressInfo = address;
    const host = info.family === 'IPv6' ? `[${info.address}]` : info.address;
    return `http://${host}:${info.port}`;
  }

  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: this.config.corsOrigin,
        methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      })
    );

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      lazyLog(this.logger, 'debug', () => ({ method: req.method, path: req.path }), 'HTTP request');
      next();
    });
  }

  private setupRoutes(): void {
    const raw = express.raw({ type: () => true, limit: this.config.maxArtifactBytes });

    this.app.get('/health', this.handleHealth.bind(this));
    this.app.get('/model', this.handleListModels.bind(this));
    this.app.get('/model/:name', this.handleModelStatus.bind(this));
    this.app.post('/model/:name', raw, asyncHandler(this.handleInference.bind(this)));
    this.app.put('/model/:name', raw, asyncHandler(this.handleUpload.bind(this)));
    this.app.get('/supervisor', (_req: Request, res: Response) => {
      res.redirect(301, '/supervisor/');
    });
    this.app.get('/supervisor/*', asyncHandler(this.handleSupervisorProxy.bind(this)));
  }

  private setupErrorHandling(): void {
    this.app.use((req: Request, res: Response) => {
      const error = new SwapError('NotFound', `Route ${req.method} ${req.path} not found`);
      res.status(404).json({ error: error.toObject() });
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = isPayloadTooLarge(err)
        ? new SwapError(
            'PayloadTooLarge',
            `Request body exceeds ${this.config.maxArtifactBytes} bytes`,
            { limit: this.config.maxArtifactBytes }
          )
        : toSwapError(err);
      const status = httpStatusFor(error.code);

      if (status >= 500) {
        this.logger?.error(
          { method: req.method, path: req.path, error: error.toObject() },
          'API error'
        );
      } else {
        this.logger?.debug({ method: req.method, path: req.path, code: error.code }, 'API error');
      }

      if (res.headersSent || res.writableEnded || req.destroyed) {
        return;
      }
      res.status(status).json({ error: error.toObject() });
    });
  }

  private handleHealth(_req: Request, res: Response): void {
    res.json({
      status: 'ok',
      models: this.registry.size(),
      timestamp: Date.now(),
    });
  }

  private handleListModels(_req: Request, res: Response): void {
    res.json({
      models: this.registry.list().map(({ controller }) => {
        const status = controller.status();
        return {
          modelName: status.modelName,
          state: status.state,
          activeSlot: status.activeSlot,
          activeVersion: status.activeVersion?.version ?? null,
          queueDepth: status.queueDepth,
        };
      }),
    });
  }

  private handleModelStatus(req: Request, res: Response, next: NextFunction): void {
    const entry = this.registry.get(req.params.name ?? '');
    if (!entry) {
      next(createNotFoundError(req.params.name ?? ''));
      return;
    }
    res.json(entry.controller.status());
  }

  private async handleInference(req: Request, res: Response): Promise<void> {
    const modelName = req.params.name ?? '';
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        abort.abort();
      }
    });

    const request: WorkerRequest = {
      method: 'POST',
      headers: toHeaderRecord(req.headers),
      body: bodyOf(req),
    };

    const response = await this.router.route(modelName, request, { signal: abort.signal });

    res.status(response.status);
    for (const [name, value] of Object.entries(response.headers)) {
      res.setHeader(name, value);
    }
    res.end(response.body);
  }

  private async handleUpload(req: Request, res: Response): Promise<void> {
    const parsed = ModelNameSchema.safeParse(req.params.name);
    if (!parsed.success) {
      throw zodErrorToSwapError(parsed.error);
    }
    const modelName = parsed.data;
    const body = bodyOf(req);
    if (body.length === 0) {
      throw new SwapError('InvalidParams', 'Artifact upload body is empty', { model: modelName });
    }

    const { version, duplicate } = await this.store.save(modelName, body);
    const entry = await this.registry.register(modelName);
    const receipt = entry.controller.submitArtifact(version);

    this.logger?.info(
      { model: modelName, version: version.version, duplicate, unchanged: receipt.unchanged },
      'Artifact accepted'
    );

    res.status(receipt.unchanged ? 200 : 202).json({
      model: modelName,
      version: receipt.version,
      hash: receipt.hash,
      duplicate,
      unchanged: receipt.unchanged,
      state: receipt.state,
    });
  }

  private async handleSupervisorProxy(req: Request, res: Response): Promise<void> {
    const suffix = req.originalUrl.slice('/supervisor'.length) || '/';
    const target = new URL(suffix, this.config.supervisorWebUrl);

    const upstream = await this.fetchSupervisor(target);
    const body = Buffer.from(await upstream.arrayBuffer());
    res.status(upstream.status);
    upstream.headers.forEach((value, name) => {
      if (!PROXY_HEADER_SKIP.has(name)) {
        res.setHeader(name, value);
      }
    });
    res.end(body);
  }

  private async fetchSupervisor(target: URL) {
    try {
      return await fetch(target, {
        method: 'GET',
        signal: AbortSignal.timeout(this.config.proxyTimeoutMs ?? 10_000),
      });
    } catch (error) {
      throw new SwapError(
        'GatewayError',
        `Supervisor web UI unreachable at ${this.config.supervisorWebUrl}`,
        { target: target.toString() },
        { cause: error }
      );
    }
  }
}
