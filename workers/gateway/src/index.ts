/**
 * Gateway entry point
 *
 * Wires configuration, logging and a demo pipeline backend into the
 * bridge and serves the Hono app on Node.
 */

import { serve } from '@hono/node-server';
import {
  PipelineBackend,
  ResilientBridge,
  createLogger,
  loadConfig,
  type PipelineStage,
} from '@resilient-bridge/core';
import { createApp } from './app';

export { createApp, requestLogger, type GatewayOptions } from './app';

/**
 * Stages of the demo backend: whitespace normalization, then an
 * acknowledgement. Replace with a real BackendHandler in deployments.
 */
export const demoStages: PipelineStage[] = [
  {
    name: 'normalize',
    async run(input) {
      return String(input).replace(/\s+/g, ' ').trim();
    },
  },
  {
    name: 'respond',
    async run(input) {
      return { content: `Received: ${String(input)}`, confidence: 1 };
    },
  },
];

export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const logger = createLogger({ service: env.SERVICE_NAME ?? 'gateway' });
  const config = loadConfig(env);
  const port = Number(env.PORT ?? 3000);

  const bridge = new ResilientBridge({
    backend: new PipelineBackend({ id: 'demo-pipeline', stages: demoStages }),
    config,
    logger,
  });
  await bridge.initialize();

  const app = createApp({
    bridge,
    logger,
    service: env.SERVICE_NAME ?? 'gateway',
    allowedOrigins: env.ALLOWED_ORIGINS?.split(',').map(origin => origin.trim()),
  });
  const server = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`Gateway listening on port ${info.port}`);
  });

  const stop = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    bridge.shutdown().catch((error: unknown) => {
      logger.error('Bridge shutdown failed', error instanceof Error ? error : { reason: String(error) });
    });
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    createLogger({ service: 'gateway' }).fatal('Gateway failed to start', error instanceof Error ? error : { reason: String(error) });
    process.exit(1);
  });
}
