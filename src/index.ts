#!/usr/bin/env node
// This is the process entrypoint that selects a transport, starts serving, and handles graceful shutdown.

import { USAGE, loadConfig, type LoadedConfig, type ServerConfig } from './config/config.js';
import { closeHttpClients, createHttpClients } from './fetcher/runtime.js';
import { createServer } from './server.js';
import { serveStdio } from './stdio-server.js';
import { normalizeError } from './utils/errors.js';
import { createStderrLogger, errorForLog } from './utils/logger.js';

function onShutdownSignal(handler: (signal: NodeJS.Signals) => void): void {
  process.once('SIGTERM', () => handler('SIGTERM'));
  process.once('SIGINT', () => handler('SIGINT'));
}

async function startSse(config: ServerConfig): Promise<void> {
  const { app } = createServer(config);

  // This helper performs graceful shutdown so open SSE sessions are ended before the listener closes.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ signal }, 'shutdown_started');
    await app.close();
    app.log.info({ signal }, 'shutdown_completed');
    process.exit(0);
  }

  onShutdownSignal((signal) => {
    void shutdown(signal);
  });

  try {
    await app.listen({ host: config.host, port: config.port });
    app.log.info({ host: config.host, port: config.port, transport: 'sse' }, 'server_started');
  } catch (error) {
    app.log.error({ error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  }
}

async function startStdio(config: ServerConfig): Promise<void> {
  const logger = createStderrLogger(config.logLevel);
  const clients = createHttpClients({ userAgent: config.userAgent }, logger);
  const { channel, completion } = serveStdio({ config, clients, logger });

  onShutdownSignal((signal) => {
    channel.disconnect(`signal:${signal}`);
  });

  const state = await completion;
  closeHttpClients(clients);
  logger.info({ event: 'shutdown_completed', state }, 'shutdown_completed');
  process.exit(0);
}

async function main(): Promise<void> {
  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${normalizeError(error).message}\n\n${USAGE}`);
    process.exit(1);
  }

  if (loaded.help) {
    process.stderr.write(USAGE);
    process.exit(0);
  }

  if (loaded.config.transport === 'sse') {
    await startSse(loaded.config);
    return;
  }

  await startStdio(loaded.config);
}

main().catch((error: unknown) => {
  process.stderr.write(`fatal: ${normalizeError(error).message}\n`);
  process.exit(1);
});
