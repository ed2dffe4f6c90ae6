/**
 * Model Registry
 *
 * Process-wide map from model name to its slot pair, request queue and
 * lifecycle controller. Entries are created on first reference and live for
 * the lifetime of the gateway. Creation is synchronous, so two concurrent
 * first references to a name always see the same entry.
 *
 * Supervisor groups listen on fixed ports, so a model keeps the ports it was
 * first allocated for good: allocations are recorded in the artifact store
 * and read back before any model is registered after a restart.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { zodErrorToSwapError } from '../api/errors.js';
import { groupNameFor, type SupervisorGateway } from '../bridge/supervisor-gateway.js';
import type { WorkerClient } from '../bridge/worker-client.js';
import { LIFECYCLE, QUEUE, SUPERVISOR } from '../config/defaults.js';
import type { SlotId, SlotPorts } from '../types/lifecycle.js';
import { ModelNameSchema } from '../types/schemas/config.js';
import type { ArtifactStore } from './artifact-store.js';
import { LifecycleController } from './lifecycle-controller.js';
import { RequestQueue } from './request-queue.js';
import { ModelSlotPair } from './slot-pair.js';
import { WorkerProcessHandle } from './worker-handle.js';

export interface ModelEntry {
  modelName: string;
  pair: ModelSlotPair;
  queue: RequestQueue;
  controller: LifecycleController;
}

export interface WorkerPortLayout {
  host: string;
  /** First port handed out; each model takes two consecutive ports (A, B) */
  basePort: number;
  /** Explicit per-model ports, taking precedence over allocation */
  ports?: Record<string, SlotPorts>;
}

export interface RegistryLifecycleOptions {
  readinessTimeoutMs?: number;
  readinessPollIntervalMs?: number;
  drainTimeoutMs?: number;
  unhealthyThreshold?: number;
  /** Health sweep period (ms); 0 disables the sweep */
  healthCheckIntervalMs?: number;
  maxRestarts?: number;
}

export interface RegistryQueueOptions {
  maxHoldMs?: number;
  maxDepth?: number;
}

export interface ModelRegistryConfig {
  gateway: SupervisorGateway;
  client: WorkerClient;
  workers: WorkerPortLayout;
  /** Supervisor group naming, e.g. '{model}-{slot}' */
  groupTemplate?: string;
  /** Binds slots, records port allocations and supplies versions on restore */
  store?: ArtifactStore;
  lifecycle?: RegistryLifecycleOptions;
  queue?: RegistryQueueOptions;
  logger?: Logger;
}

export interface ModelRegistryEvents {
  modelRegistered: (entry: ModelEntry) => void;
}

export class ModelRegistry extends EventEmitter<ModelRegistryEvents> {
  private readonly config: ModelRegistryConfig;
  private readonly logger?: Logger;
  private readonly entries = new Map<string, ModelEntry>();
  private readonly groupTemplate: string;
  private readonly allocations = new Map<string, SlotPorts>();
  /** Models whose allocation is already recorded in the store */
  private readonly recorded = new Set<string>();
  private healthTimer?: NodeJS.Timeout;

  constructor(config: ModelRegistryConfig) {
    super();
    this.config = config;
    this.logger = config.logger;
    this.groupTemplate = config.groupTemplate ?? SUPERVISOR.GROUP_TEMPLATE;
  }

  public get(modelName: string): ModelEntry | undefined {
    return this.entries.get(modelName);
  }

  public has(modelName: string): boolean {
    return this.entries.has(modelName);
  }

  /** Entries sorted by model name. */
  public list(): ModelEntry[] {
    return [...this.entries.values()].sort((a, b) => a.modelName.localeCompare(b.modelName));
  }

  public size(): number {
    return this.entries.size;
  }

  /**
   * Entry for `modelName`, created on first reference.
   *
   * @throws {SwapError} InvalidParams when the name is not a valid model name
   */
  public getOrCreate(modelName: string): ModelEntry {
    const existing = this.entries.get(modelName);
    if (existing) {
      return existing;
    }

    const parsed = ModelNameSchema.safeParse(modelName);
    if (!parsed.success) {
      throw zodErrorToSwapError(parsed.error);
    }

    const entry = this.createEntry(modelName);
    this.entries.set(modelName, entry);
    this.logger?.info(
      {
        model: modelName,
        slots: entry.pair.snapshot().map(({ slot, groupName, baseUrl }) => ({
          slot,
          groupName,
          baseUrl,
        })),
      },
      'Model registered'
    );
    this.emit('modelRegistered', entry);
    return entry;
  }

  /**
   * Entry for `modelName`, created on first reference, with its port
   * allocation recorded in the artifact store.
   */
  public async register(modelName: string): Promise<ModelEntry> {
    const entry = this.getOrCreate(modelName);
    await this.recordPorts(modelName);
    return entry;
  }

  /**
   * Read the port allocations recorded for every stored model. Call before
   * registering any model so new allocations never reuse recorded ports.
   */
  public async loadPortAllocations(): Promise<void> {
    const store = this.config.store;
    if (!store) {
      return;
    }
    for (const modelName of await store.listModels()) {
      if (this.entries.has(modelName)) {
        continue;
      }
      const ports = await store.readPorts(modelName);
      if (ports) {
        this.allocations.set(modelName, ports);
        this.recorded.add(modelName);
      }
    }
    this.logger?.debug({ models: [...this.recorded] }, 'Port allocations loaded');
  }

  /**
   * Register every model found in the artifact store and submit its latest
   * version for promotion.
   *
   * @returns names of the models submitted
   */
  public async restore(): Promise<string[]> {
    const store = this.config.store;
    if (!store) {
      return [];
    }

    await this.loadPortAllocations();

    const restored: string[] = [];
    for (const modelName of await store.listModels()) {
      const latest = await store.latest(modelName);
      if (!latest) {
        continue;
      }
      const entry = await this.register(modelName);
      entry.controller.submitArtifact(latest);
      restored.push(modelName);
    }

    this.logger?.info({ models: restored }, 'Restored models from artifact store');
    return restored;
  }

  /**
   * Start the periodic health sweep over every model's active slot.
   */
  public startHealthChecks(): void {
    const intervalMs =
      this.config.lifecycle?.healthCheckIntervalMs ?? LIFECYCLE.HEALTH_CHECK_INTERVAL_MS;
    if (intervalMs <= 0 || this.healthTimer) {
      return;
    }
    this.healthTimer = setInterval(() => {
      for (const entry of this.entries.values()) {
        void entry.controller.checkHealth();
      }
    }, intervalMs);
    this.healthTimer.unref();
    this.logger?.debug({ intervalMs }, 'Health sweep started');
  }

  public stopHealthChecks(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = undefined;
    }
  }

  /**
   * Stop the sweep and shut down every controller.
   */
  public async shutdown(): Promise<void> {
    this.stopHealthChecks();
    await Promise.all([...this.entries.values()].map((entry) => entry.controller.shutdown()));
  }

  private createEntry(modelName: string): ModelEntry {
    const lifecycle = this.config.lifecycle ?? {};
    const logger = this.logger?.child({ model: modelName });
    const ports = this.portsFor(modelName);

    const handleFor = (slot: SlotId): WorkerProcessHandle =>
      new WorkerProcessHandle({
        modelName,
        slot,
        groupName: groupNameFor(this.groupTemplate, modelName, slot),
        baseUrl: `http://${this.config.workers.host}:${ports[slot]}`,
        unhealthyThreshold: lifecycle.unhealthyThreshold ?? LIFECYCLE.UNHEALTHY_THRESHOLD,
        client: this.config.client,
        logger,
      });

    const pair = new ModelSlotPair({
      modelName,
      slotA: handleFor('A'),
      slotB: handleFor('B'),
      gateway: this.config.gateway,
      binder: this.config.store,
      logger,
    });

    const queue = new RequestQueue({
      modelName,
      maxHoldMs: this.config.queue?.maxHoldMs ?? QUEUE.MAX_HOLD_MS,
      maxDepth: this.config.queue?.maxDepth ?? QUEUE.MAX_DEPTH,
      logger,
    });

    const controller = new LifecycleController({
      modelName,
      pair,
      queue,
      readinessTimeoutMs: lifecycle.readinessTimeoutMs,
      readinessPollIntervalMs: lifecycle.readinessPollIntervalMs,
      drainTimeoutMs: lifecycle.drainTimeoutMs,
      maxRestarts: lifecycle.maxRestarts,
      logger,
    });

    return { modelName, pair, queue, controller };
  }

  private portsFor(modelName: string): SlotPorts {
    const explicit = this.config.workers.ports?.[modelName];
    if (explicit) {
      return explicit;
    }
    const allocated = this.allocations.get(modelName);
    if (allocated) {
      return allocated;
    }

    const used = new Set<number>();
    const taken = [...this.allocations.values(), ...Object.values(this.config.workers.ports ?? {})];
    for (const ports of taken) {
      used.add(ports.A);
      used.add(ports.B);
    }
    let first = this.config.workers.basePort;
    while (used.has(first) || used.has(first + 1)) {
      first += 2;
    }

    const ports: SlotPorts = { A: first, B: first + 1 };
    this.allocations.set(modelName, ports);
    return ports;
  }

  private async recordPorts(modelName: string): Promise<void> {
    const store = this.config.store;
    const ports = this.allocations.get(modelName);
    if (!store || !ports || this.recorded.has(modelName)) {
      return;
    }
    await store.writePorts(modelName, ports);
    this.recorded.add(modelName);
    this.logger?.info({ model: modelName, ports }, 'Worker ports allocated');
  }
}
