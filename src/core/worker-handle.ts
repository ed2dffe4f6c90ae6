/**
 * Worker Process Handle
 *
 * Represents one supervised model-server process (slot A or B of a model).
 * Tracks health as observed through readiness probes and forwarded
 * requests, counts requests in flight against the process, and lets the
 * lifecycle controller wait for those requests to drain before the process
 * is stopped.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SwapError } from '../api/errors.js';
import type { WorkerClient } from '../bridge/worker-client.js';
import {
  WorkerHealth,
  type ArtifactVersion,
  type SlotId,
  type SlotSnapshot,
  type WorkerRequest,
  type WorkerResponse,
} from '../types/lifecycle.js';

export interface WorkerProcessHandleConfig {
  modelName: string;
  slot: SlotId;
  /** Supervisor process group backing this slot */
  groupName: string;
  /** Inference base URL, e.g. http://127.0.0.1:5005 */
  baseUrl: string;
  /** Consecutive failed probes before a READY worker is UNHEALTHY */
  unhealthyThreshold: number;
  client: WorkerClient;
  logger?: Logger;
}

export interface WorkerProcessHandleEvents {
  healthChanged: (slot: SlotId, from: WorkerHealth, to: WorkerHealth) => void;
}

type DrainResolution = () => void;

export class WorkerProcessHandle extends EventEmitter<WorkerProcessHandleEvents> {
  public readonly modelName: string;
  public readonly slot: SlotId;
  public readonly groupName: string;
  public readonly baseUrl: string;

  private readonly unhealthyThreshold: number;
  private readonly client: WorkerClient;
  private readonly logger?: Logger;
  private readonly drainWaiters = new Set<DrainResolution>();

  private health: WorkerHealth = WorkerHealth.STOPPED;
  private version: ArtifactVersion | null = null;
  private inFlight = 0;
  private consecutiveFailures = 0;

  constructor(config: WorkerProcessHandleConfig) {
    super();
    this.modelName = config.modelName;
    this.slot = config.slot;
    this.groupName = config.groupName;
    this.baseUrl = config.baseUrl;
    this.unhealthyThreshold = Math.max(1, config.unhealthyThreshold);
    this.client = config.client;
    this.logger = config.logger;
  }

  public getHealth(): WorkerHealth {
    return this.health;
  }

  public getVersion(): ArtifactVersion | null {
    return this.version;
  }

  public getInFlight(): number {
    return this.inFlight;
  }

  /** Mark the process as launched with `version`; readiness not yet known. */
  public markStarting(version: ArtifactVersion): void {
    this.version = version;
    this.consecutiveFailures = 0;
    this.setHealth(WorkerHealth.STARTING);
  }

  /** Restart of the same artifact (crash recovery). */
  public markRestarting(): void {
    this.consecutiveFailures = 0;
    this.setHealth(WorkerHealth.STARTING);
  }

  /** Restart attempt gave up; keep the slot out of the STARTING hold. */
  public markUnhealthy(): void {
    this.setHealth(WorkerHealth.UNHEALTHY);
  }

  public markStopped(): void {
    this.consecutiveFailures = 0;
    this.setHealth(WorkerHealth.STOPPED);
  }

  /**
   * Issue one readiness/liveness probe and fold the result into health.
   *
   * While STARTING a failed probe leaves the handle STARTING (the caller
   * bounds startup with its own timeout). Once READY, `unhealthyThreshold`
   * consecutive failures flip the handle to UNHEALTHY.
   */
  public async probe(): Promise<WorkerHealth> {
    if (this.health === WorkerHealth.STOPPED) {
      return this.health;
    }
    const ok = await this.client.probe(this.baseUrl);
    if (this.getHealth() === WorkerHealth.STOPPED) {
      // Stopped while the probe was in flight
      return this.health;
    }
    if (ok) {
      this.consecutiveFailures = 0;
      this.setHealth(WorkerHealth.READY);
    } else if (this.health !== WorkerHealth.STARTING) {
      this.recordFailure();
    }
    return this.health;
  }

  /**
   * Forward a request to this worker, counting it as in flight until the
   * worker's response (or failure) is back.
   *
   * A transport failure counts toward the UNHEALTHY threshold like a
   * failed probe; the caller gets `UpstreamUnavailable` and no other slot
   * is tried.
   */
  public async forward(request: WorkerRequest, signal?: AbortSignal): Promise<WorkerResponse> {
    this.inFlight += 1;
    try {
      const response = await this.client.forward(this.baseUrl, request, signal);
      this.consecutiveFailures = 0;
      if (this.health === WorkerHealth.UNHEALTHY) {
        this.setHealth(WorkerHealth.READY);
      }
      return response;
    } catch (error) {
      if (
        error instanceof SwapError &&
        error.code === 'UpstreamUnavailable' &&
        this.health !== WorkerHealth.STARTING &&
        this.health !== WorkerHealth.STOPPED
      ) {
        this.recordFailure();
      }
      throw error;
    } finally {
      this.inFlight -= 1;
      if (this.inFlight === 0) {
        this.notifyDrainWaiters();
      }
    }
  }

  /**
   * Wait until no request is in flight against this worker.
   *
   * @returns true when drained, false when `timeoutMs` elapsed first
   */
  public waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight === 0) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      let settled = false;
      let timeout: NodeJS.Timeout | undefined;

      const finish = (result: boolean): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        this.drainWaiters.delete(listener);
        resolve(result);
      };

      const listener: DrainResolution = () => finish(true);

      this.drainWaiters.add(listener);
      timeout = setTimeout(() => finish(false), timeoutMs);
    });
  }

  public snapshot(): SlotSnapshot {
    return {
      slot: this.slot,
      groupName: this.groupName,
      baseUrl: this.baseUrl,
      health: this.health,
      inFlight: this.inFlight,
      version: this.version?.version,
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  private recordFailure(): void {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.unhealthyThreshold) {
      this.setHealth(WorkerHealth.UNHEALTHY);
    }
  }

  private notifyDrainWaiters(): void {
    for (const waiter of [...this.drainWaiters]) {
      waiter();
    }
  }

  private setHealth(next: WorkerHealth): void {
    const previous = this.health;
    if (previous === next) {
      return;
    }
    this.health = next;
    this.logger?.debug(
      { model: this.modelName, slot: this.slot, from: previous, to: next },
      'Worker health changed'
    );
    this.emit('healthChanged', this.slot, previous, next);
  }
}
