export {
  SwapError,
  httpStatusFor,
  isSwapError,
  toSwapError,
  zodErrorToSwapError,
  type SwapErrorCode,
  type SwapErrorShape,
} from './api/errors.js';

export {
  SupervisorctlGateway,
  execaRunner,
  groupNameFor,
  aggregateProcessStates,
  parseStatusOutput,
  type SupervisorGateway,
  type SupervisorctlGatewayConfig,
  type CommandRunner,
  type CommandResult,
} from './bridge/supervisor-gateway.js';
export {
  HttpWorkerClient,
  type WorkerClient,
  type HttpWorkerClientConfig,
} from './bridge/worker-client.js';

export {
  ArtifactStore,
  hashArtifact,
  type ArtifactStoreConfig,
  type SaveResult,
  type SlotBinder,
} from './core/artifact-store.js';
export {
  LifecycleController,
  type LifecycleControllerConfig,
  type LifecycleControllerEvents,
  type SubmitReceipt,
} from './core/lifecycle-controller.js';
export {
  ModelRegistry,
  type ModelEntry,
  type ModelRegistryConfig,
} from './core/model-registry.js';
export { RequestQueue, type RequestQueueConfig, type HeldRequest } from './core/request-queue.js';
export { RequestRouter, type RouteOptions } from './core/request-router.js';
export { ModelSlotPair, type ModelSlotPairConfig } from './core/slot-pair.js';
export { WorkerProcessHandle, type WorkerProcessHandleConfig } from './core/worker-handle.js';

export { ApiServer, type ApiServerConfig } from './controller/api-server.js';
export { GatewayNode, type GatewayNodeOptions } from './controller/gateway-node.js';

export { loadConfig, validateConfig, defaultConfigPath } from './config/loader.js';
export { RuntimeConfigSchema, ModelNameSchema, type RuntimeConfig } from './types/schemas/config.js';

export { createTelemetryBridge } from './telemetry/bridge.js';
export { TelemetryManager, type TelemetryConfig, type SlotswapMetrics } from './telemetry/otel.js';

export * from './types/lifecycle.js';
