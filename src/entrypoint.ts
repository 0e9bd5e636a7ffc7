#!/usr/bin/env node
/**
 * Container entrypoint: read env, validate, start the webhook server.
 * Handles SIGTERM/SIGINT by closing the server (in-flight reviews finish first).
 * Exit codes: 0 = clean shutdown, EXIT_CONFIG (1) = config error, EXIT_RUNTIME (2) = listen/close failure.
 */

import type { Server } from 'node:net';
import { ConfigError, loadConfig } from './config.js';
import type { WebhookConfig } from './config.js';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { createLogger, rootLogger } from './logger.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  let config: WebhookConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const msg = err instanceof ConfigError ? err.message : String(err);
    rootLogger.error('Invalid config: ' + msg, err instanceof ConfigError && err.field ? { field: err.field } : undefined);
    process.exitCode = EXIT_CONFIG;
    return;
  }

  const logger = createLogger({}, { level: config.logLevel });
  logger.info('Injector entrypoint starting', {
    port: config.port,
    tls: config.tls !== undefined,
    images: {
      helper: config.injector.helperImage,
      init: config.injector.initImage,
      proxy: config.injector.proxyImage,
      debugUi: config.injector.debugUiImage,
    },
    agentXds: `${config.injector.agentXdsService}:${config.injector.agentXdsPort}`,
  });

  let server: Server;
  try {
    server = await startServer({
      port: config.port,
      tls: config.tls,
      injectorOptions: config.injector,
      logger,
    });
  } catch (err) {
    logger.error('Server start failed', { err: String(err) });
    process.exitCode = EXIT_RUNTIME;
    return;
  }

  function shutdown(signal: string): void {
    logger.info(`Received ${signal}, closing server`);
    server.close((err) => {
      if (err) {
        logger.error('Error during shutdown', { err: String(err) });
        process.exit(EXIT_RUNTIME);
      }
      process.exit(0);
    });
  }

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  rootLogger.error('Entrypoint failed', { err: String(err) });
  process.exit(EXIT_RUNTIME);
});
