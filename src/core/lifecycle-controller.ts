/**
 * Lifecycle Controller
 *
 * Per-model state machine driving artifact promotion:
 *
 * ```
 * EMPTY ──upload──▶ PROMOTING ──ready──▶ DRAINING ──old slot stopped──▶ ACTIVE_ONLY
 *                       │                                                  │
 *                       └──timeout/crash──▶ FAILED ◀───────────────────────┘
 *                                             └──upload──▶ PROMOTING
 * ```
 *
 * Every mutation of lifecycle state and of the slot pair's active pointer
 * runs on this controller's task chain, so promotions and health sweeps for
 * one model never overlap. Different models have independent controllers.
 *
 * Uploads are accepted synchronously; while a promotion runs, only the
 * newest pending artifact is kept for the next one.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SwapError, createCancelledError, toSwapError } from '../api/errors.js';
import { LIFECYCLE } from '../config/defaults.js';
import {
  LifecycleState,
  WorkerHealth,
  type ArtifactVersion,
  type ModelStatusSnapshot,
  type SlotId,
} from '../types/lifecycle.js';
import type { RequestQueue } from './request-queue.js';
import type { ModelSlotPair } from './slot-pair.js';
import type { WorkerProcessHandle } from './worker-handle.js';

export interface LifecycleControllerConfig {
  modelName: string;
  pair: ModelSlotPair;
  queue: RequestQueue;
  /** Upper bound for a standby slot to pass its readiness probe (ms) */
  readinessTimeoutMs?: number;
  /** Delay between readiness probes (ms) */
  readinessPollIntervalMs?: number;
  /** Upper bound for the superseded slot to finish in-flight work (ms) */
  drainTimeoutMs?: number;
  /** Restart attempts for a crashed active slot before giving up */
  maxRestarts?: number;
  logger?: Logger;
}

/**
 * Events emitted by the controller (telemetry, logs, tests).
 */
export interface LifecycleControllerEvents {
  stateChanged: (modelName: string, from: LifecycleState, to: LifecycleState) => void;
  promotionStarted: (modelName: string, slot: SlotId, version: ArtifactVersion) => void;
  promoted: (modelName: string, slot: SlotId, version: ArtifactVersion, durationMs: number) => void;
  promotionFailed: (
    modelName: string,
    error: SwapError,
    version: ArtifactVersion,
    durationMs: number
  ) => void;
  artifactSuperseded: (
    modelName: string,
    superseded: ArtifactVersion,
    by: ArtifactVersion
  ) => void;
  requestsReleased: (modelName: string, count: number) => void;
  slotDrained: (modelName: string, slot: SlotId, clean: boolean) => void;
  workerRestarted: (modelName: string, slot: SlotId, attempt: number, success: boolean) => void;
}

/**
 * Returned by `submitArtifact`; the promotion itself continues in the background.
 */
export interface SubmitReceipt {
  modelName: string;
  version: number;
  hash: string;
  /** True when the artifact is the one already set to be serving */
  unchanged: boolean;
  state: LifecycleState;
}

interface LastError {
  code: string;
  message: string;
  at: number;
}

function toPromotionError(error: unknown): SwapError {
  const swapError = toSwapError(error, 'PromotionFailed');
  return swapError.code === 'InternalError'
    ? new SwapError('PromotionFailed', swapError.message, swapError.details, { cause: error })
    : swapError;
}

export class LifecycleController extends EventEmitter<LifecycleControllerEvents> {
  public readonly modelName: string;

  private readonly pair: ModelSlotPair;
  private readonly queue: RequestQueue;
  private readonly readinessTimeoutMs: number;
  private readonly readinessPollIntervalMs: number;
  private readonly drainTimeoutMs: number;
  private readonly maxRestarts: number;
  private readonly logger?: Logger;
  private readonly shutdownController = new AbortController();

  private state: LifecycleState = LifecycleState.EMPTY;
  private activeVersion: ArtifactVersion | null = null;
  private targetVersion: ArtifactVersion | null = null;
  private pendingVersion: ArtifactVersion | null = null;
  private lastError: LastError | null = null;
  private restartCount = 0;
  private updatedAt = Date.now();

  private tail: Promise<void> = Promise.resolve();
  private promotionScheduled = false;
  private closed = false;

  constructor(config: LifecycleControllerConfig) {
    super();
    this.modelName = config.modelName;
    this.pair = config.pair;
    this.queue = config.queue;
    this.readinessTimeoutMs = config.readinessTimeoutMs ?? LIFECYCLE.READINESS_TIMEOUT_MS;
    this.readinessPollIntervalMs =
      config.readinessPollIntervalMs ?? LIFECYCLE.READINESS_POLL_INTERVAL_MS;
    this.drainTimeoutMs = config.drainTimeoutMs ?? LIFECYCLE.DRAIN_TIMEOUT_MS;
    this.maxRestarts = config.maxRestarts ?? LIFECYCLE.MAX_RESTARTS;
    this.logger = config.logger;
  }

  public getState(): LifecycleState {
    return this.state;
  }

  /**
   * Handle to route to, or null when requests must be held: no slot has
   * been promoted yet, or the active slot is being restarted.
   */
  public currentActive(): WorkerProcessHandle | null {
    const handle = this.pair.activeHandle();
    if (!handle || handle.getHealth() === WorkerHealth.STARTING) {
      return null;
    }
    return handle;
  }

  /**
   * Accept a stored artifact for promotion. Returns immediately.
   */
  public submitArtifact(version: ArtifactVersion): SubmitReceipt {
    if (version.modelName !== this.modelName) {
      throw new SwapError(
        'InvalidParams',
        `Artifact for '${version.modelName}' submitted to '${this.modelName}'`,
        { model: this.modelName, artifactModel: version.modelName }
      );
    }
    if (this.closed) {
      throw new SwapError('UpstreamUnavailable', 'Gateway is shutting down', {
        model: this.modelName,
      });
    }

    // The version that will be serving once queued work settles
    const settling = this.pendingVersion ?? this.targetVersion ?? this.activeVersion;
    if (settling?.hash === version.hash) {
      this.logger?.info(
        { model: this.modelName, version: version.version, hash: version.hash },
        'Artifact unchanged, no promotion needed'
      );
      return this.receipt(version, true);
    }

    if (this.pendingVersion) {
      this.logger?.info(
        {
          model: this.modelName,
          superseded: this.pendingVersion.version,
          by: version.version,
        },
        'Pending artifact superseded'
      );
      this.emit('artifactSuperseded', this.modelName, this.pendingVersion, version);
      this.pendingVersion = null;
    }

    // The running promotion already loads this artifact
    if (this.targetVersion?.hash === version.hash) {
      return this.receipt(version, false);
    }
    this.pendingVersion = version;

    if (!this.promotionScheduled) {
      this.promotionScheduled = true;
      void this.run(() => this.promotePending());
    }

    return this.receipt(version, false);
  }

  /**
   * Probe the active slot and restart its process group if it crashed.
   */
  public checkHealth(): Promise<void> {
    return this.run(() => this.sweep());
  }

  /**
   * Resolve once no lifecycle task is queued or running.
   */
  public async idle(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }

  /**
   * Stop accepting uploads, cancel waits and reject held requests.
   */
  public async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pendingVersion = null;
    this.shutdownController.abort();
    this.queue.close(createCancelledError('Gateway shutting down'));
    await this.idle();
  }

  public status(): ModelStatusSnapshot {
    return {
      modelName: this.modelName,
      state: this.state,
      activeSlot: this.pair.activeSlot(),
      activeVersion: this.activeVersion,
      targetVersion: this.targetVersion,
      pendingVersion: this.pendingVersion?.version ?? null,
      lastError: this.lastError,
      restartCount: this.restartCount,
      queueDepth: this.queue.size(),
      slots: this.pair.snapshot(),
      updatedAt: this.updatedAt,
    };
  }

  private run(task: () => Promise<void>): Promise<void> {
    const next = this.tail.then(task).catch((error: unknown) => {
      this.logger?.error(
        { model: this.modelName, error: toSwapError(error).toObject() },
        'Lifecycle task failed'
      );
    });
    this.tail = next;
    return next;
  }

  private async promotePending(): Promise<void> {
    try {
      while (this.pendingVersion && !this.closed) {
        const version = this.pendingVersion;
        this.pendingVersion = null;
        await this.promote(version);
      }
    } finally {
      this.promotionScheduled = false;
    }
  }

  private async promote(version: ArtifactVersion): Promise<void> {
    const slot = this.pair.standbySlot();
    const startedAt = Date.now();

    this.targetVersion = version;
    this.setState(LifecycleState.PROMOTING);
    this.emit('promotionStarted', this.modelName, slot, version);

    try {
      await this.pair.startSlot(slot, version);
      await this.waitForReady(slot);
    } catch (error) {
      const failure = toPromotionError(error);
      const durationMs = Date.now() - startedAt;
      await this.stopQuietly(slot);
      this.targetVersion = null;
      this.recordError(failure);
      this.setState(LifecycleState.FAILED);
      this.logger?.warn(
        {
          model: this.modelName,
          slot,
          version: version.version,
          durationMs,
          error: failure.toObject(),
        },
        'Promotion failed'
      );
      this.emit('promotionFailed', this.modelName, failure, version, durationMs);
      return;
    }

    // Pointer flip and replay of held requests happen without yielding
    const previous = this.pair.promote(slot);
    this.activeVersion = version;
    this.targetVersion = null;
    this.lastError = null;
    this.restartCount = 0;
    this.releaseHeld();
    this.setState(LifecycleState.DRAINING);

    const durationMs = Date.now() - startedAt;
    this.logger?.info(
      { model: this.modelName, slot, previous, version: version.version, durationMs },
      'Slot promoted'
    );
    this.emit('promoted', this.modelName, slot, version, durationMs);

    if (previous !== null) {
      const clean = await this.pair.get(previous).waitForDrain(this.drainTimeoutMs);
      if (!clean) {
        this.logger?.warn(
          {
            model: this.modelName,
            slot: previous,
            inFlight: this.pair.get(previous).getInFlight(),
            timeoutMs: this.drainTimeoutMs,
          },
          'Drain timed out, stopping slot with requests in flight'
        );
      }
      this.emit('slotDrained', this.modelName, previous, clean);
      await this.stopQuietly(previous);
    } else {
      await this.stopLeftoverStandby();
    }

    this.setState(LifecycleState.ACTIVE_ONLY);
  }

  private async sweep(): Promise<void> {
    const slot = this.pair.activeSlot();
    if (this.closed || slot === null) {
      return;
    }

    const health = await this.pair.pollReady(slot);
    if (health === WorkerHealth.READY) {
      this.restartCount = 0;
      return;
    }
    if (health !== WorkerHealth.UNHEALTHY) {
      return;
    }

    const processState = await this.pair.processState(slot);
    if (processState === 'RUNNING') {
      this.logger?.warn(
        { model: this.modelName, slot },
        'Active worker failing probes while its process is running'
      );
      return;
    }

    if (this.restartCount >= this.maxRestarts) {
      this.logger?.error(
        { model: this.modelName, slot, processState, restarts: this.restartCount },
        'Active worker down and restart limit reached'
      );
      this.recordError(
        new SwapError('UpstreamUnavailable', `Active slot ${slot} is down (${processState})`, {
          model: this.modelName,
          slot,
        })
      );
      return;
    }

    this.restartCount += 1;
    const attempt = this.restartCount;
    this.logger?.warn(
      { model: this.modelName, slot, processState, attempt },
      'Restarting active worker'
    );

    try {
      await this.pair.restartSlot(slot);
      await this.waitForReady(slot);
    } catch (error) {
      const failure = toPromotionError(error);
      this.pair.get(slot).markUnhealthy();
      this.recordError(failure);
      this.queue.clear(
        new SwapError('UpstreamUnavailable', `Active slot ${slot} failed to restart`, {
          model: this.modelName,
          slot,
        })
      );
      this.logger?.error(
        { model: this.modelName, slot, attempt, error: failure.toObject() },
        'Active worker restart failed'
      );
      this.emit('workerRestarted', this.modelName, slot, attempt, false);
      return;
    }

    this.logger?.info({ model: this.modelName, slot, attempt }, 'Active worker restarted');
    this.emit('workerRestarted', this.modelName, slot, attempt, true);
    this.releaseHeld();
  }

  /**
   * Probe until READY, the process exits, or the readiness bound elapses.
   */
  private async waitForReady(slot: SlotId): Promise<void> {
    const deadline = Date.now() + this.readinessTimeoutMs;

    for (;;) {
      const health = await this.pair.pollReady(slot);
      if (health === WorkerHealth.READY) {
        return;
      }

      const processState = await this.pair.processState(slot);
      if (processState === 'FATAL' || processState === 'STOPPED') {
        throw new SwapError(
          'PromotionFailed',
          `Process group for slot ${slot} exited while starting (${processState})`,
          { model: this.modelName, slot, processState }
        );
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new SwapError(
          'PromotionTimeout',
          `Slot ${slot} did not become ready within ${this.readinessTimeoutMs}ms`,
          { model: this.modelName, slot, timeoutMs: this.readinessTimeoutMs }
        );
      }
      await this.sleep(Math.min(this.readinessPollIntervalMs, remaining));
    }
  }

  /**
   * Hand every held request to the active slot in arrival order. The
   * forwards run concurrently; each caller gets its own response.
   */
  private releaseHeld(): void {
    const handle = this.pair.activeHandle();
    if (!handle) {
      return;
    }
    const held = this.queue.drainAll();
    for (const entry of held) {
      void handle
        .forward(entry.request, entry.signal)
        .then(entry.resolve, (error: unknown) => entry.reject(toSwapError(error)));
    }
    if (held.length > 0) {
      this.emit('requestsReleased', this.modelName, held.length);
    }
  }

  private async stopQuietly(slot: SlotId): Promise<void> {
    if (this.pair.activeSlot() === slot) {
      return;
    }
    try {
      await this.pair.stopSlot(slot);
    } catch (error) {
      this.logger?.error(
        { model: this.modelName, slot, error: toSwapError(error).toObject() },
        'Failed to stop slot'
      );
    }
  }

  /**
   * On a first promotion the other slot's group may still be running from
   * before a gateway restart.
   */
  private async stopLeftoverStandby(): Promise<void> {
    const slot = this.pair.standbySlot();
    try {
      const processState = await this.pair.processState(slot);
      if (processState !== 'RUNNING') {
        return;
      }
      this.logger?.warn(
        { model: this.modelName, slot, group: this.pair.get(slot).groupName },
        'Stopping standby process group left running'
      );
      await this.pair.stopSlot(slot);
    } catch (error) {
      this.logger?.error(
        { model: this.modelName, slot, error: toSwapError(error).toObject() },
        'Failed to stop standby slot'
      );
    }
  }

  private sleep(ms: number): Promise<void> {
    const signal = this.shutdownController.signal;
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(createCancelledError('Gateway shutting down'));
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(createCancelledError('Gateway shutting down'));
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private recordError(error: SwapError): void {
    this.lastError = { code: error.code, message: error.message, at: Date.now() };
    this.updatedAt = Date.now();
  }

  private setState(next: LifecycleState): void {
    const previous = this.state;
    this.updatedAt = Date.now();
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger?.info({ model: this.modelName, from: previous, to: next }, 'Lifecycle state changed');
    this.emit('stateChanged', this.modelName, previous, next);
  }

  private receipt(version: ArtifactVersion, unchanged: boolean): SubmitReceipt {
    return {
      modelName: this.modelName,
      version: version.version,
      hash: version.hash,
      unchanged,
      state: this.state,
    };
  }
}
