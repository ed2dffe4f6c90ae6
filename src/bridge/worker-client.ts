/**
 * Worker HTTP Client
 *
 * Talks to a single model-server process over HTTP: forwards inference
 * requests and issues the lightweight readiness probe.
 */

import type { Logger } from 'pino';
import { SwapError } from '../api/errors.js';
import { WORKERS } from '../config/defaults.js';
import type { WorkerRequest, WorkerResponse } from '../types/lifecycle.js';

/**
 * Transport used by worker handles; injected so tests can avoid sockets.
 */
export interface WorkerClient {
  /**
   * Forward a request to `baseUrl`. Resolves with whatever the worker
   * answered, error statuses included. Rejects with `UpstreamUnavailable`
   * when no HTTP response was obtained, or `Cancelled` when `signal` fired.
   */
  forward(baseUrl: string, request: WorkerRequest, signal?: AbortSignal): Promise<WorkerResponse>;

  /** Resolve true when the worker answers the health path with a 2xx. */
  probe(baseUrl: string): Promise<boolean>;
}

export interface HttpWorkerClientConfig {
  inferencePath?: string;
  healthPath?: string;
  probeTimeoutMs?: number;
  forwardTimeoutMs?: number;
  logger?: Logger;
}

/** Hop-by-hop headers never copied between client and worker. */
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

export function filterHeaders(headers: Record<string, string>): Record<string, string> {
  const filtered: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!HOP_BY_HOP.has(name.toLowerCase())) {
      filtered[name.toLowerCase()] = value;
    }
  }
  return filtered;
}

/**
 * fetch-based WorkerClient.
 */
export class HttpWorkerClient implements WorkerClient {
  private readonly inferencePath: string;
  private readonly healthPath: string;
  private readonly probeTimeoutMs: number;
  private readonly forwardTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(config: HttpWorkerClientConfig = {}) {
    this.inferencePath = config.inferencePath ?? WORKERS.INFERENCE_PATH;
    this.healthPath = config.healthPath ?? WORKERS.HEALTH_PATH;
    this.probeTimeoutMs = config.probeTimeoutMs ?? WORKERS.PROBE_TIMEOUT_MS;
    this.forwardTimeoutMs = config.forwardTimeoutMs ?? WORKERS.FORWARD_TIMEOUT_MS;
    this.logger = config.logger;
  }

  public async forward(
    baseUrl: string,
    request: WorkerRequest,
    signal?: AbortSignal
  ): Promise<WorkerResponse> {
    const url = `${baseUrl}${request.path ?? this.inferencePath}`;
    if (signal?.aborted) {
      throw new SwapError('Cancelled', 'Request cancelled by client', { url });
    }
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.forwardTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const hasBody = request.method !== 'GET' && request.method !== 'HEAD';

    try {
      const response = await fetch(url, {
        method: request.method,
        headers: filterHeaders(request.headers),
        body: hasBody ? request.body : undefined,
        signal: controller.signal,
      });

      const body = Buffer.from(await response.arrayBuffer());
      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        // fetch has already decoded the body
        if (!HOP_BY_HOP.has(name) && name !== 'content-encoding') {
          headers[name] = value;
        }
      });

      return { status: response.status, headers, body };
    } catch (error) {
      if (signal?.aborted) {
        throw new SwapError('Cancelled', 'Request cancelled by client', { url }, { cause: error });
      }
      const reason = timedOut
        ? `no response within ${this.forwardTimeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      this.logger?.warn({ url, reason }, 'Worker forward failed');
      throw new SwapError(
        'UpstreamUnavailable',
        `Worker at ${baseUrl} unavailable: ${reason}`,
        { baseUrl },
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  public async probe(baseUrl: string): Promise<boolean> {
    try {
      const response = await fetch(`${baseUrl}${this.healthPath}`, {
        method: 'GET',
        signal: AbortSignal.timeout(this.probeTimeoutMs),
      });
      // Drain the body so the socket is released
      await response.arrayBuffer();
      return response.ok;
    } catch (error) {
      this.logger?.debug(
        { baseUrl, error: error instanceof Error ? error.message : String(error) },
        'Worker probe failed'
      );
      return false;
    }
  }
}
