#!/usr/bin/env node
/**
 * Gateway Startup Script
 *
 * Usage: slotswap [config-path]
 * The config path falls back to SLOTSWAP_CONFIG, then config/runtime.yaml.
 */

import { loadConfig } from '../src/config/loader.js';
import { GatewayNode } from '../src/controller/gateway-node.js';
import { createRootLogger } from '../src/utils/logger-helpers.js';

async function main(): Promise<void> {
  const config = loadConfig(process.argv[2]);
  const logger = createRootLogger({ level: config.logging.level });

  const node = new GatewayNode({ config, logger });

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Already shutting down, please wait...');
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down gracefully');

    try {
      await node.stop();
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await node.start();

  logger.info(
    {
      url: node.url(),
      supervisor: config.supervisor.server_url,
      artifacts: config.artifacts.root_dir,
      endpoints: ['GET /health', 'GET /model', 'GET|POST|PUT /model/:name', 'GET /supervisor/'],
    },
    'Gateway is READY'
  );
}

main().catch((error: unknown) => {
  console.error('Failed to start gateway:', error);
  process.exit(1);
});
