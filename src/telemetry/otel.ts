/**
 * OpenTelemetry infrastructure for the gateway.
 *
 * Provides the metrics provider, the Prometheus exporter and the standard
 * instruments for promotions, routing, held requests and worker restarts.
 *
 * @module telemetry/otel
 */

import { metrics, type Meter, type Counter, type Histogram } from '@opentelemetry/api';
import { MeterProvider } from '@opentelemetry/sdk-metrics';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import type { Logger } from 'pino';

/**
 * Configuration options for OpenTelemetry metrics.
 */
export interface TelemetryConfig {
  /**
   * Enable metrics collection (default: false).
   */
  enabled: boolean;
  /**
   * Service name for metrics (default: 'model-slotswap').
   */
  serviceName?: string;
  /**
   * Prometheus exporter port (default: 9464).
   */
  prometheusPort?: number;
  logger?: Logger;
}

interface NormalizedTelemetryConfig {
  enabled: boolean;
  serviceName: string;
  prometheusPort: number;
  logger: Logger | undefined;
}

/**
 * Standard metrics exported by the gateway.
 */
export interface SlotswapMetrics {
  // Lifecycle
  promotionsTotal: Counter;
  promotionDuration: Histogram;
  artifactsSuperseded: Counter;
  workerRestarts: Counter;
  drainTimeouts: Counter;

  // Routing
  requestsRouted: Counter;
  requestsReleased: Counter;
  routeErrors: Counter;
}

/**
 * OpenTelemetry telemetry manager.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, prometheusPort: 9464 });
 * await telemetry.start();
 * telemetry.metrics.promotionsTotal.add(1, { model: 'greeter', outcome: 'promoted' });
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private readonly config: NormalizedTelemetryConfig;
  private meterProvider: MeterProvider | null = null;
  private prometheusExporter: PrometheusExporter | null = null;
  private meter: Meter | null = null;
  private _metrics: SlotswapMetrics | null = null;
  private started = false;

  constructor(config: TelemetryConfig) {
    this.config = {
      enabled: config.enabled,
      serviceName: config.serviceName || 'model-slotswap',
      prometheusPort: config.prometheusPort ?? 9464,
      logger: config.logger,
    };
  }

  /**
   * Get the initialized metrics. Throws if not started.
   */
  public get metrics(): SlotswapMetrics {
    if (!this._metrics) {
      throw new Error('TelemetryManager not started. Call start() first.');
    }
    return this._metrics;
  }

  /**
   * Initialize the metrics provider with the Prometheus exporter as reader.
   *
   * @throws {Error} if telemetry is disabled.
   */
  public async start(): Promise<void> {
    if (!this.config.enabled) {
      throw new Error('Telemetry is disabled. Set enabled:true in config.');
    }

    if (this.started) {
      this.config.logger?.warn('TelemetryManager already started');
      return;
    }

    try {
      this.prometheusExporter = new PrometheusExporter({
        port: this.config.prometheusPort,
      });

      this.meterProvider = new MeterProvider({
        readers: [this.prometheusExporter],
      });

      metrics.setGlobalMeterProvider(this.meterProvider);
      this.meter = metrics.getMeter(this.config.serviceName, '0.1.0');
      this._metrics = this.createMetrics(this.meter);
      this.started = true;

      this.config.logger?.info(
        {
          serviceName: this.config.serviceName,
          endpoint: `http://localhost:${this.config.prometheusPort}/metrics`,
        },
        'OpenTelemetry metrics started'
      );
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to start telemetry');
      throw error;
    }
  }

  /**
   * Shutdown the metrics provider and the exporter's HTTP server.
   */
  public async shutdown(): Promise<void> {
    if (!this.started) {
      return;
    }

    try {
      await this.meterProvider?.shutdown();
      await this.prometheusExporter?.shutdown();

      this.started = false;
      this._metrics = null;
      this.meter = null;
      this.meterProvider = null;
      this.prometheusExporter = null;

      this.config.logger?.info('OpenTelemetry metrics shut down');
    } catch (error) {
      this.config.logger?.error({ error }, 'Failed to shutdown telemetry');
      throw error;
    }
  }

  public isStarted(): boolean {
    return this.started;
  }

  private createMetrics(meter: Meter): SlotswapMetrics {
    return {
      promotionsTotal: meter.createCounter('slotswap_promotions_total', {
        description: 'Promotion attempts by outcome',
        unit: '1',
      }),
      promotionDuration: meter.createHistogram('slotswap_promotion_duration_ms', {
        description: 'Time from promotion start to ready or failure',
        unit: 'ms',
      }),
      artifactsSuperseded: meter.createCounter('slotswap_artifacts_superseded_total', {
        description: 'Pending artifacts replaced by a newer upload before promotion',
        unit: '1',
      }),
      workerRestarts: meter.createCounter('slotswap_worker_restarts_total', {
        description: 'Restarts of crashed active workers',
        unit: '1',
      }),
      drainTimeouts: meter.createCounter('slotswap_drain_timeouts_total', {
        description: 'Superseded slots stopped with requests still in flight',
        unit: '1',
      }),

      requestsRouted: meter.createCounter('slotswap_requests_routed_total', {
        description: 'Requests routed, by disposition (forwarded or queued)',
        unit: '1',
      }),
      requestsReleased: meter.createCounter('slotswap_requests_released_total', {
        description: 'Held requests replayed after a slot became active',
        unit: '1',
      }),
      routeErrors: meter.createCounter('slotswap_route_errors_total', {
        description: 'Routing failures by error code',
        unit: '1',
      }),
    };
  }
}

export function createTelemetry(config: TelemetryConfig): TelemetryManager {
  return new TelemetryManager(config);
}
