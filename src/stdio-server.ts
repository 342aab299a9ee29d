// This module serves exactly one session over the process's standard input and output.

import type { Readable, Writable } from 'node:stream';
import type { FastifyBaseLogger } from 'fastify';
import type { ServerConfig } from './config/config.js';
import type { HttpClients } from './fetcher/runtime.js';
import { runSession } from './mcp/session.js';
import { StdioChannel } from './transport/stdio.js';
import type { SessionState } from './types/mcp.js';

export interface StdioServerOptions {
  config: Pick<ServerConfig, 'fetchTimeoutMs'>;
  clients: HttpClients;
  logger: FastifyBaseLogger;
  input?: Readable;
  output?: Writable;
}

export interface StdioServer {
  channel: StdioChannel;
  // Resolves once stdin has ended or the channel was disconnected, after release.
  completion: Promise<SessionState>;
}

export function serveStdio(options: StdioServerOptions): StdioServer {
  const channel = new StdioChannel({
    logger: options.logger,
    input: options.input,
    output: options.output
  });

  options.logger.info({ event: 'stdio_server_started', sessionId: channel.id }, 'stdio_server_started');

  const completion = runSession(channel, {
    clients: options.clients,
    logger: options.logger,
    fetchTimeoutMs: options.config.fetchTimeoutMs
  });

  return { channel, completion };
}
