/**
 * Lifecycle domain types shared by the slot pair, the lifecycle controller,
 * the router and the HTTP surface.
 *
 * @module types/lifecycle
 */

/** One of the two fixed process identities a model can run as. */
export type SlotId = 'A' | 'B';

/** Worker ports of a model's two slots. */
export type SlotPorts = Record<SlotId, number>;

/**
 * Health of a single worker process handle.
 */
export enum WorkerHealth {
  /** Process launched, readiness probe not yet passed. */
  STARTING = 'STARTING',
  /** Readiness probe passed; eligible for traffic. */
  READY = 'READY',
  /** Consecutive probe/forward failures crossed the threshold. */
  UNHEALTHY = 'UNHEALTHY',
  /** Process stopped (or never started). */
  STOPPED = 'STOPPED',
}

/**
 * Per-model lifecycle state.
 */
export enum LifecycleState {
  /** No slot has ever become active. */
  EMPTY = 'EMPTY',
  /** Steady state: one slot active, the other stopped. */
  ACTIVE_ONLY = 'ACTIVE_ONLY',
  /** Standby slot is starting with a new artifact. */
  PROMOTING = 'PROMOTING',
  /** Standby promoted; previous slot finishing its in-flight work. */
  DRAINING = 'DRAINING',
  /** Last promotion attempt failed; last good slot (if any) keeps serving. */
  FAILED = 'FAILED',
}

/**
 * Process state reported by the external supervisor for a process group.
 */
export type SupervisorProcessState = 'RUNNING' | 'STOPPED' | 'FATAL' | 'UNKNOWN';

/**
 * Immutable description of one uploaded artifact.
 */
export interface ArtifactVersion {
  modelName: string;
  /** Monotonic per-model version counter, starting at 1. */
  version: number;
  /** sha256 of the artifact bytes (hex). */
  hash: string;
  /** Absolute path of the stored artifact file. */
  path: string;
  sizeBytes: number;
  createdAt: number;
}

/**
 * Request held by the router or forwarded to a worker.
 *
 * The body is kept opaque; workers receive it byte-for-byte.
 */
export interface WorkerRequest {
  method: string;
  /** Path on the worker; defaults to the configured inference path. */
  path?: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Worker response returned verbatim to the original caller.
 */
export interface WorkerResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Snapshot of one slot for status queries.
 */
export interface SlotSnapshot {
  slot: SlotId;
  groupName: string;
  baseUrl: string;
  health: WorkerHealth;
  inFlight: number;
  version?: number;
  consecutiveFailures: number;
}

/**
 * Snapshot of a model's lifecycle for status endpoints.
 */
export interface ModelStatusSnapshot {
  modelName: string;
  state: LifecycleState;
  activeSlot: SlotId | null;
  activeVersion: ArtifactVersion | null;
  targetVersion: ArtifactVersion | null;
  pendingVersion: number | null;
  lastError: { code: string; message: string; at: number } | null;
  restartCount: number;
  queueDepth: number;
  slots: SlotSnapshot[];
  updatedAt: number;
}
