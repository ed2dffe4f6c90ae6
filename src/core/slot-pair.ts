/**
 * Model Slot Pair
 *
 * Fixed pair of worker handles (slot A, slot B) for one model plus the
 * pointer naming which of them receives traffic. The pointer only ever
 * moves through `promote`, a synchronous swap, so no request can observe a
 * state where two slots are active or where the active slot never passed
 * readiness.
 *
 * Process control for each slot (start, probe, stop) goes through the
 * supervisor gateway; the lifecycle controller decides when.
 */

import type { Logger } from 'pino';
import { SwapError } from '../api/errors.js';
import type { SupervisorGateway } from '../bridge/supervisor-gateway.js';
import {
  WorkerHealth,
  type ArtifactVersion,
  type SlotId,
  type SlotSnapshot,
  type SupervisorProcessState,
} from '../types/lifecycle.js';
import type { SlotBinder } from './artifact-store.js';
import type { WorkerProcessHandle } from './worker-handle.js';

export interface ModelSlotPairConfig {
  modelName: string;
  slotA: WorkerProcessHandle;
  slotB: WorkerProcessHandle;
  gateway: SupervisorGateway;
  /** Points a slot at its artifact before the process starts */
  binder?: SlotBinder;
  logger?: Logger;
}

export class ModelSlotPair {
  public readonly modelName: string;
  private readonly slots: readonly [WorkerProcessHandle, WorkerProcessHandle];
  private readonly gateway: SupervisorGateway;
  private readonly binder?: SlotBinder;
  private readonly logger?: Logger;
  private active: SlotId | null = null;

  constructor(config: ModelSlotPairConfig) {
    if (config.slotA.slot !== 'A' || config.slotB.slot !== 'B') {
      throw new SwapError('InternalError', 'Slot pair requires handles for slots A and B', {
        model: config.modelName,
      });
    }
    this.modelName = config.modelName;
    this.slots = [config.slotA, config.slotB];
    this.gateway = config.gateway;
    this.binder = config.binder;
    this.logger = config.logger;
  }

  public get(slot: SlotId): WorkerProcessHandle {
    return slot === 'A' ? this.slots[0] : this.slots[1];
  }

  public activeSlot(): SlotId | null {
    return this.active;
  }

  /** Active handle, or null while no slot has been promoted. */
  public activeHandle(): WorkerProcessHandle | null {
    return this.active === null ? null : this.get(this.active);
  }

  /** The slot a new artifact is loaded into: the inactive one (A when empty). */
  public standbySlot(): SlotId {
    return this.active === 'A' ? 'B' : 'A';
  }

  /**
   * Launch the slot's process group bound to `version`.
   *
   * A group still running from an earlier attempt is stopped first so the
   * process always loads the newly bound artifact.
   */
  public async startSlot(slot: SlotId, version: ArtifactVersion): Promise<void> {
    const handle = this.get(slot);
    if (this.binder) {
      await this.binder.bindSlot(this.modelName, slot, version);
    }
    if ((await this.gateway.status(handle.groupName)) === 'RUNNING') {
      await this.gateway.stop(handle.groupName);
    }
    handle.markStarting(version);
    await this.gateway.start(handle.groupName);
    this.logger?.info(
      { model: this.modelName, slot, version: version.version, group: handle.groupName },
      'Slot starting'
    );
  }

  /** Start the slot's group again with the artifact it already holds. */
  public async restartSlot(slot: SlotId): Promise<void> {
    const handle = this.get(slot);
    handle.markRestarting();
    await this.gateway.start(handle.groupName);
    this.logger?.info({ model: this.modelName, slot, group: handle.groupName }, 'Slot restarting');
  }

  /** One health probe against the slot's worker. */
  public pollReady(slot: SlotId): Promise<WorkerHealth> {
    return this.get(slot).probe();
  }

  /** Supervisor view of the slot's process group. */
  public processState(slot: SlotId): Promise<SupervisorProcessState> {
    return this.gateway.status(this.get(slot).groupName);
  }

  /**
   * Stop the slot's process group. The handle is marked STOPPED even when
   * the supervisor call fails, and the failure is rethrown.
   */
  public async stopSlot(slot: SlotId): Promise<void> {
    const handle = this.get(slot);
    if (this.active === slot) {
      throw new SwapError('InternalError', `Refusing to stop active slot ${slot}`, {
        model: this.modelName,
        slot,
      });
    }
    try {
      await this.gateway.stop(handle.groupName);
    } finally {
      handle.markStopped();
    }
    this.logger?.info({ model: this.modelName, slot, group: handle.groupName }, 'Slot stopped');
  }

  /**
   * Make `slot` the active slot. The only writer of the active pointer.
   *
   * @returns the previously active slot, if any
   */
  public promote(slot: SlotId): SlotId | null {
    const handle = this.get(slot);
    if (handle.getHealth() !== WorkerHealth.READY) {
      throw new SwapError(
        'InternalError',
        `Cannot promote slot ${slot} of '${this.modelName}' in state ${handle.getHealth()}`,
        { model: this.modelName, slot, health: handle.getHealth() }
      );
    }
    const previous = this.active;
    this.active = slot;
    return previous === slot ? null : previous;
  }

  /** Number of slots whose handle is the active one: 0 or 1. */
  public activeCount(): number {
    return this.slots.filter((handle) => handle.slot === this.active).length;
  }

  public snapshot(): SlotSnapshot[] {
    return this.slots.map((handle) => handle.snapshot());
  }
}
