/**
 * Gateway Node
 *
 * Wires configuration into the gateway's components (supervisor gateway,
 * worker client, artifact store, registry, router, HTTP server, telemetry)
 * and owns their start/stop order.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { SupervisorctlGateway, type SupervisorGateway } from '../bridge/supervisor-gateway.js';
import { HttpWorkerClient, type WorkerClient } from '../bridge/worker-client.js';
import { ArtifactStore } from '../core/artifact-store.js';
import { ModelRegistry } from '../core/model-registry.js';
import { RequestRouter } from '../core/request-router.js';
import { createTelemetryBridge } from '../telemetry/bridge.js';
import type { TelemetryManager } from '../telemetry/otel.js';
import type { RuntimeConfig } from '../types/schemas/config.js';
import { createRootLogger } from '../utils/logger-helpers.js';
import { ApiServer } from './api-server.js';

export interface GatewayNodeOptions {
  config: RuntimeConfig;
  logger?: Logger;
  /** Replaces the supervisorctl-backed gateway */
  gateway?: SupervisorGateway;
  /** Replaces the fetch-backed worker client */
  client?: WorkerClient;
}

export interface GatewayNodeEvents {
  started: (url: string) => void;
  stopped: () => void;
}

export class GatewayNode extends EventEmitter<GatewayNodeEvents> {
  public readonly registry: ModelRegistry;
  public readonly router: RequestRouter;
  public readonly store: ArtifactStore;
  public readonly apiServer: ApiServer;

  private readonly config: RuntimeConfig;
  private readonly logger: Logger;
  private telemetry: TelemetryManager | null = null;
  private running = false;

  constructor(options: GatewayNodeOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createRootLogger({ level: config.logging.level });

    const gateway =
      options.gateway ??
      new SupervisorctlGateway({
        command: config.supervisor.command,
        serverUrl: config.supervisor.server_url,
        username: config.supervisor.username,
        password: config.supervisor.password,
        commandTimeoutMs: config.supervisor.command_timeout_ms,
        logger: this.logger.child({ component: 'supervisor' }),
      });

    const client =
      options.client ??
      new HttpWorkerClient({
        inferencePath: config.workers.inference_path,
        healthPath: config.workers.health_path,
        probeTimeoutMs: config.workers.probe_timeout_ms,
        forwardTimeoutMs: config.workers.forward_timeout_ms,
        logger: this.logger.child({ component: 'worker-client' }),
      });

    this.store = new ArtifactStore({
      rootDir: config.artifacts.root_dir,
      artifactFileName: config.artifacts.artifact_file_name,
      logger: this.logger.child({ component: 'artifacts' }),
    });

    this.registry = new ModelRegistry({
      gateway,
      client,
      store: this.store,
      groupTemplate: config.supervisor.group_template,
      workers: {
        host: config.workers.host,
        basePort: config.workers.base_port,
        ports: config.workers.ports,
      },
      lifecycle: {
        readinessTimeoutMs: config.lifecycle.readiness_timeout_ms,
        readinessPollIntervalMs: config.lifecycle.readiness_poll_interval_ms,
        drainTimeoutMs: config.lifecycle.drain_timeout_ms,
        unhealthyThreshold: config.lifecycle.unhealthy_threshold,
        healthCheckIntervalMs: config.lifecycle.health_check_interval_ms,
        maxRestarts: config.lifecycle.max_restarts,
      },
      queue: {
        maxHoldMs: config.queue.max_hold_ms,
        maxDepth: config.queue.max_depth,
      },
      logger: this.logger.child({ component: 'lifecycle' }),
    });

    this.router = new RequestRouter({
      registry: this.registry,
      logger: this.logger.child({ component: 'router' }),
    });

    this.apiServer = new ApiServer(
      {
        registry: this.registry,
        router: this.router,
        store: this.store,
        logger: this.logger.child({ component: 'http' }),
      },
      {
        host: config.server.host,
        port: config.server.port,
        maxArtifactBytes: config.server.max_artifact_bytes,
        corsOrigin: config.server.cors_origin,
        supervisorWebUrl: config.supervisor.web_url,
      }
    );
  }

  public isRunning(): boolean {
    return this.running;
  }

  public url(): string | null {
    return this.apiServer.url();
  }

  /**
   * Start telemetry, restore stored models, start the health sweep and
   * begin accepting HTTP requests.
   */
  public async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.telemetry = await createTelemetryBridge(
      {
        enabled: this.config.telemetry.enabled,
        serviceName: this.config.telemetry.service_name,
        prometheusPort: this.config.telemetry.prometheus_port,
      },
      this.registry,
      this.router,
      this.logger.child({ component: 'telemetry' })
    );

    if (this.config.artifacts.restore_on_startup) {
      await this.registry.restore();
    } else {
      await this.registry.loadPortAllocations();
    }
    this.registry.startHealthChecks();

    await this.apiServer.start();
    this.running = true;

    const url = this.url() ?? '';
    this.logger.info({ url, models: this.registry.size() }, 'Gateway ready');
    this.emit('started', url);
  }

  /**
   * Stop accepting HTTP, reject held requests and stop background work.
   * Worker processes are left running under the supervisor.
   */
  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    // Held requests keep their connections open, so close() only settles
    // once the registry has rejected them. Closed queues turn away requests
    // still arriving on busy keep-alive connections.
    const closing = this.apiServer.stop();
    await this.registry.shutdown();
    await closing;
    await this.telemetry?.shutdown();
    this.telemetry = null;

    this.logger.info('Gateway stopped');
    this.emit('stopped');
  }
}
