#!/usr/bin/env node
/**
 * KMS Console
 * Starts the KMS service, then serves the dashboard for it
 */

import { config, validateConfig, resolvePath } from './config.js';
import { logger } from './utils/logger.js';
import { detectDisplayAddress } from './utils/network.js';
import { LogSink } from './core/log-sink.js';
import { ConfigStore } from './core/config-store.js';
import { ProcessSupervisor } from './core/supervisor.js';
import { createFileDatabaseLoader } from './core/product-db.js';
import { SpawnError, errorMessage } from './core/errors.js';
import { WebInterface } from './interfaces/web.js';
import type { ServerStatus, SupervisorState } from './types/index.js';

function toServerStatus(state: SupervisorState): ServerStatus {
  switch (state) {
    case 'running':
      return 'running';
    case 'stopped':
    case 'crashed':
      return 'stopped';
    case 'not_started':
      return 'unknown';
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

async function main() {
  logger.info('=== KMS Console ===');

  const validation = validateConfig();
  if (!validation.valid) {
    validation.errors.forEach(err => logger.warn(`  - ${err}`));
  }

  const sink = new LogSink(resolvePath(config.paths.log_file), {
    maxBytes: config.logs.tail_max_bytes
  });

  const configStore = new ConfigStore(sink, {
    bind_address: config.kms.bind_address,
    port: config.kms.port,
    status: 'unknown',
    display_address: config.kms.display_address || detectDisplayAddress()
  });

  const supervisor = new ProcessSupervisor(sink, config.service.stop_timeout_ms);
  supervisor.onStateChange((state) => {
    configStore.setStatus(toServerStatus(state));
  });

  if (config.service.autostart) {
    try {
      await supervisor.start({
        command: config.service.command,
        args: config.service.args,
        cwd: resolvePath(config.service.cwd)
      });
      // No readiness probe: give the service a moment to bind
      await delay(config.service.startup_grace_ms);
    } catch (error) {
      if (!(error instanceof SpawnError)) throw error;
      logger.error(error.message, { code: error.code, os_code: error.osCode });
      logger.warn('Continuing without a running KMS service');
    }
  } else {
    logger.info('Service autostart disabled');
  }

  const web = new WebInterface({
    configStore,
    sink,
    loadDatabase: createFileDatabaseLoader(resolvePath(config.paths.product_db)),
    serviceStatus: () => supervisor.status(),
    options: {
      pageLogLines: config.logs.page_lines,
      apiLogLines: config.logs.api_lines,
      pollIntervalMs: config.web.log_poll_interval_ms
    }
  });
  await web.start(config.server.port, config.server.host);

  const current = configStore.get();
  logger.info(`KMS service: ${current.bind_address}:${current.port} (${current.status})`);
  logger.info(`Logs: ${sink.path}`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...', { signal });
    try {
      await supervisor.stop();
      await web.stop();
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
    }
    process.exit(0);
  };

  process.on('SIGINT', () => { void shutdown('SIGINT'); });
  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
}

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', { reason: String(reason) });
});

main().catch((error) => {
  logger.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
