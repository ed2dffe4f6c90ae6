/**
 * Request Queue
 *
 * Holds requests for a model that has no active slot yet. Entries keep
 * their arrival order; when a slot is promoted the lifecycle controller
 * takes every entry at once with `drainAll()` and forwards them.
 *
 * Each held request is bounded by `maxHoldMs` and by the caller's abort
 * signal, so a client that disconnects (or waits too long) is removed from
 * the queue and never forwarded.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  SwapError,
  createCancelledError,
  createQueueTimeoutError,
} from '../api/errors.js';
import { QUEUE } from '../config/defaults.js';
import type { WorkerRequest, WorkerResponse } from '../types/lifecycle.js';

/**
 * Held request as handed out by `drainAll()`.
 */
export interface HeldRequest {
  id: string;
  request: WorkerRequest;
  /** Caller's abort signal, still live after the entry leaves the queue */
  signal?: AbortSignal;
  enqueuedAt: number;
  resolve: (response: WorkerResponse) => void;
  reject: (error: Error) => void;
}

interface QueueEntry extends HeldRequest {
  timeoutHandle?: NodeJS.Timeout;
  onAbort?: () => void;
}

export interface RequestQueueConfig {
  modelName: string;

  /**
   * Maximum time a request may be held (ms).
   * @default 600000 (10 minutes); 0 disables the bound
   */
  maxHoldMs?: number;

  /**
   * Maximum number of held requests; further requests are rejected
   * with `UpstreamUnavailable`.
   * @default 1000; 0 disables the bound
   */
  maxDepth?: number;

  logger?: Logger;
}

export interface EnqueueOptions {
  signal?: AbortSignal;
  /** Per-request override of the configured hold bound */
  maxHoldMs?: number;
}

export interface RequestQueueStats {
  /** Requests currently held */
  queued: number;
  /** Requests handed to a slot since creation */
  released: number;
  /** Requests dropped because their hold bound elapsed */
  expired: number;
  /** Requests dropped because the caller went away */
  cancelled: number;
  /** Requests turned away because the queue was full */
  rejected: number;
  /** Age of the oldest held request (ms), 0 when empty */
  oldestAgeMs: number;
}

/**
 * FIFO hold queue for one model.
 *
 * @example
 * ```typescript
 * const queue = new RequestQueue({ modelName: 'greeter', maxHoldMs: 5000 });
 * const pending = queue.enqueue(request, { signal });
 * // later, once a slot is active
 * for (const held of queue.drainAll()) {
 *   forward(held.request).then(held.resolve, held.reject);
 * }
 * ```
 */
export class RequestQueue {
  public readonly modelName: string;
  private readonly maxHoldMs: number;
  private readonly maxDepth: number;
  private readonly logger?: Logger;

  private readonly entries = new Map<string, QueueEntry>();
  private released = 0;
  private expired = 0;
  private cancelled = 0;
  private rejected = 0;
  private closedWith: Error | null = null;

  constructor(config: RequestQueueConfig) {
    this.modelName = config.modelName;
    this.maxHoldMs = config.maxHoldMs ?? QUEUE.MAX_HOLD_MS;
    this.maxDepth = config.maxDepth ?? QUEUE.MAX_DEPTH;
    this.logger = config.logger;
  }

  /**
   * Hold `request` until it is released, expires or is cancelled.
   *
   * Resolves with the worker response the controller obtained for it.
   */
  public enqueue(request: WorkerRequest, options: EnqueueOptions = {}): Promise<WorkerResponse> {
    if (this.closedWith) {
      this.rejected += 1;
      return Promise.reject(this.closedWith);
    }

    if (options.signal?.aborted) {
      this.cancelled += 1;
      return Promise.reject(createCancelledError('Request cancelled before it was queued'));
    }

    if (this.maxDepth > 0 && this.entries.size >= this.maxDepth) {
      this.rejected += 1;
      this.logger?.warn(
        { model: this.modelName, depth: this.entries.size },
        'Request queue full'
      );
      return Promise.reject(
        new SwapError(
          'UpstreamUnavailable',
          `Model '${this.modelName}' has no active slot and ${this.entries.size} requests are already waiting`,
          { model: this.modelName, depth: this.entries.size }
        )
      );
    }

    const id = randomUUID();
    const holdMs = options.maxHoldMs ?? this.maxHoldMs;

    return new Promise<WorkerResponse>((resolve, reject) => {
      const entry: QueueEntry = {
        id,
        request,
        signal: options.signal,
        enqueuedAt: Date.now(),
        resolve,
        reject,
      };

      if (holdMs > 0) {
        entry.timeoutHandle = setTimeout(() => this.handleTimeout(id, holdMs), holdMs);
      }

      if (options.signal) {
        const onAbort = (): void => {
          if (this.remove(id)) {
            this.cancelled += 1;
            this.logger?.debug({ model: this.modelName, requestId: id }, 'Held request cancelled');
            reject(createCancelledError());
          }
        };
        entry.onAbort = onAbort;
        options.signal.addEventListener('abort', onAbort, { once: true });
      }

      this.entries.set(id, entry);

      this.logger?.debug(
        { model: this.modelName, requestId: id, depth: this.entries.size },
        'Request held'
      );
    });
  }

  /**
   * Remove and return every held request in arrival order.
   *
   * Timers and abort listeners are detached; the caller owns settling
   * each entry from here on.
   */
  public drainAll(): HeldRequest[] {
    const drained: HeldRequest[] = [];
    for (const entry of this.entries.values()) {
      this.detach(entry);
      drained.push({
        id: entry.id,
        request: entry.request,
        signal: entry.signal,
        enqueuedAt: entry.enqueuedAt,
        resolve: entry.resolve,
        reject: entry.reject,
      });
    }
    this.entries.clear();
    this.released += drained.length;

    if (drained.length > 0) {
      this.logger?.info({ model: this.modelName, count: drained.length }, 'Held requests released');
    }
    return drained;
  }

  /**
   * Reject every held request with `error`. The queue stays open.
   */
  public clear(error: Error): number {
    const entries = [...this.entries.values()];
    for (const entry of entries) {
      this.detach(entry);
    }
    this.entries.clear();
    for (const entry of entries) {
      entry.reject(error);
    }
    if (entries.length > 0) {
      this.logger?.info({ model: this.modelName, count: entries.length }, 'Held requests rejected');
    }
    return entries.length;
  }

  /**
   * Reject every held request and every later enqueue with `error`.
   */
  public close(error: Error): number {
    this.closedWith = error;
    return this.clear(error);
  }

  public isClosed(): boolean {
    return this.closedWith !== null;
  }

  public size(): number {
    return this.entries.size;
  }

  public getStats(): RequestQueueStats {
    let oldest = Number.POSITIVE_INFINITY;
    for (const entry of this.entries.values()) {
      oldest = Math.min(oldest, entry.enqueuedAt);
    }
    return {
      queued: this.entries.size,
      released: this.released,
      expired: this.expired,
      cancelled: this.cancelled,
      rejected: this.rejected,
      oldestAgeMs: this.entries.size === 0 ? 0 : Date.now() - oldest,
    };
  }

  private handleTimeout(requestId: string, holdMs: number): void {
    const entry = this.entries.get(requestId);
    if (!entry) {
      return;
    }
    this.remove(requestId);
    this.expired += 1;
    this.logger?.warn({ model: this.modelName, requestId, holdMs }, 'Held request timed out');
    entry.reject(createQueueTimeoutError(this.modelName, holdMs));
  }

  private remove(requestId: string): boolean {
    const entry = this.entries.get(requestId);
    if (!entry) {
      return false;
    }
    this.detach(entry);
    this.entries.delete(requestId);
    return true;
  }

  private detach(entry: QueueEntry): void {
    if (entry.timeoutHandle) {
      clearTimeout(entry.timeoutHandle);
      entry.timeoutHandle = undefined;
    }
    if (entry.onAbort) {
      entry.signal?.removeEventListener('abort', entry.onAbort);
      entry.onAbort = undefined;
    }
  }
}
