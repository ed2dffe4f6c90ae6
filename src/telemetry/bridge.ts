/**
 * Telemetry bridge
 *
 * Subscribes the metrics of a TelemetryManager to the events emitted by
 * the registry, its lifecycle controllers and the request router.
 *
 * @module telemetry/bridge
 */

import type { Logger } from 'pino';
import type { ModelEntry, ModelRegistry } from '../core/model-registry.js';
import type { RequestRouter } from '../core/request-router.js';
import { TelemetryManager, type SlotswapMetrics, type TelemetryConfig } from './otel.js';

/**
 * Start a TelemetryManager (when enabled) and wire it to the gateway's events.
 *
 * @returns the manager, for shutdown
 */
export async function createTelemetryBridge(
  config: TelemetryConfig,
  registry: ModelRegistry,
  router: RequestRouter,
  logger?: Logger
): Promise<TelemetryManager> {
  const manager = new TelemetryManager({ ...config, logger });

  if (!config.enabled) {
    return manager;
  }

  await manager.start();
  attachMetrics(manager.metrics, registry, router);
  return manager;
}

/**
 * Record gateway events into `metrics`. Models registered later are
 * picked up through the registry's `modelRegistered` event.
 */
export function attachMetrics(
  metrics: SlotswapMetrics,
  registry: ModelRegistry,
  router: RequestRouter
): void {
  const attachController = ({ controller }: ModelEntry): void => {
    controller.on('promoted', (model, slot, _version, durationMs) => {
      metrics.promotionsTotal.add(1, { model, slot, outcome: 'promoted' });
      metrics.promotionDuration.record(durationMs, { model, outcome: 'promoted' });
    });
    controller.on('promotionFailed', (model, error, _version, durationMs) => {
      metrics.promotionsTotal.add(1, { model, outcome: error.code });
      metrics.promotionDuration.record(durationMs, { model, outcome: error.code });
    });
    controller.on('artifactSuperseded', (model) => {
      metrics.artifactsSuperseded.add(1, { model });
    });
    controller.on('requestsReleased', (model, count) => {
      metrics.requestsReleased.add(count, { model });
    });
    controller.on('slotDrained', (model, slot, clean) => {
      if (!clean) {
        metrics.drainTimeouts.add(1, { model, slot });
      }
    });
    controller.on('workerRestarted', (model, slot, _attempt, success) => {
      metrics.workerRestarts.add(1, { model, slot, success: String(success) });
    });
  };

  registry.list().forEach(attachController);
  registry.on('modelRegistered', attachController);

  router.on('routed', (model, disposition) => {
    metrics.requestsRouted.add(1, { model, disposition });
  });
  router.on('routeFailed', (model, code) => {
    metrics.routeErrors.add(1, { model, code });
  });
}
