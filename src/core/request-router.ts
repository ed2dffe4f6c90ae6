/**
 * Request Router
 *
 * Resolves a model name to its lifecycle controller and either forwards the
 * request to the active worker or holds it in the model's queue until a
 * slot is promoted.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { createNotFoundError, isSwapError } from '../api/errors.js';
import type { WorkerRequest, WorkerResponse } from '../types/lifecycle.js';
import type { ModelRegistry } from './model-registry.js';

export interface RouteOptions {
  /** Fires when the client goes away; held or in-flight work is abandoned */
  signal?: AbortSignal;
}

export type RouteDisposition = 'forwarded' | 'queued';

export interface RequestRouterEvents {
  routed: (modelName: string, disposition: RouteDisposition) => void;
  routeFailed: (modelName: string, code: string) => void;
}

export interface RequestRouterConfig {
  registry: ModelRegistry;
  logger?: Logger;
}

export class RequestRouter extends EventEmitter<RequestRouterEvents> {
  private readonly registry: ModelRegistry;
  private readonly logger?: Logger;

  constructor(config: RequestRouterConfig) {
    super();
    this.registry = config.registry;
    this.logger = config.logger;
  }

  /**
   * Route one request.
   *
   * Resolves with the worker's response verbatim, error statuses included.
   * Rejects with `NotFound` for unknown models, `UpstreamUnavailable` when
   * the active worker cannot be reached, `QueueTimeout` or `Cancelled` for
   * held requests that never got a slot.
   */
  public async route(
    modelName: string,
    request: WorkerRequest,
    options: RouteOptions = {}
  ): Promise<WorkerResponse> {
    const entry = this.registry.get(modelName);
    if (!entry) {
      this.emit('routeFailed', modelName, 'NotFound');
      throw createNotFoundError(modelName);
    }

    const active = entry.controller.currentActive();
    const disposition: RouteDisposition = active ? 'forwarded' : 'queued';
    this.emit('routed', modelName, disposition);

    try {
      if (active) {
        return await active.forward(request, options.signal);
      }
      this.logger?.debug(
        { model: modelName, state: entry.controller.getState() },
        'No active slot, holding request'
      );
      return await entry.queue.enqueue(request, { signal: options.signal });
    } catch (error) {
      if (isSwapError(error)) {
        this.emit('routeFailed', modelName, error.code);
        if (error.code === 'UpstreamUnavailable') {
          this.logger?.warn(
            { model: modelName, slot: active?.slot, error: error.message },
            'Forwarding to active worker failed'
          );
        }
      }
      throw error;
    }
  }
}
