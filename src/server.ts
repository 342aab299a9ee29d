// This module wires the HTTP application for the SSE transport, its request logging, and lifecycle resources.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { ServerConfig } from './config/config.js';
import { closeHttpClients, createHttpClients, type HttpClients } from './fetcher/runtime.js';
import { MESSAGES_PATH, SSE_PATH, registerSseRoutes, type SseSessionView } from './http/sse.js';
import { buildLoggerOptions, sanitizeForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

export interface ServerResources {
  app: FastifyInstance;
  clients: HttpClients;
  sessions: SseSessionView;
}

export interface CreateServerOptions {
  // Tests inject stand-in clients; production builds them from config.
  clients?: HttpClients;
}

type SseServerConfig = Pick<ServerConfig, 'logLevel' | 'fetchTimeoutMs' | 'userAgent' | 'sseMaxQueuedMessages'>;

// This function builds and configures the full HTTP application.
export function createServer(config: SseServerConfig, options: CreateServerOptions = {}): ServerResources {
  const app = Fastify({
    logger: buildLoggerOptions(config.logLevel),
    bodyLimit: 1024 * 1024,
    ignoreTrailingSlash: true
  });

  const clients = options.clients ?? createHttpClients({ userAgent: config.userAgent }, app.log);
  // High-resolution start times for request duration logging.
  const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

  // This hook enriches request logs with consistent route and request-id metadata.
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());

    request.log.info(
      {
        event: 'http_request_start',
        requestId: request.id,
        method: request.method,
        path: request.url,
        ip: request.ip,
        userAgent: request.headers['user-agent'] ?? null,
        query: sanitizeForLog(request.query ?? null)
      },
      'http_request_start'
    );
  });

  // This hook logs response completion including status and duration for request tracing.
  app.addHook('onResponse', async (request, reply) => {
    const startTime = requestStartTimes.get(request);
    const durationMs = startTime ? Number(process.hrtime.bigint() - startTime) / 1_000_000 : undefined;

    request.log.info(
      {
        event: 'http_request_complete',
        requestId: request.id,
        statusCode: reply.statusCode,
        method: request.method,
        path: request.url,
        durationMs
      },
      'http_request_complete'
    );
  });

  // This endpoint exposes a lightweight liveness signal.
  app.get('/health', async () => {
    return {
      ok: true,
      status: 'alive',
      activeSessions: sessions.size,
      ts: new Date().toISOString()
    };
  });

  // This endpoint exposes canonical server and protocol version metadata.
  app.get('/version', async () => {
    return {
      ok: true,
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION,
      protocolVersion: MCP_PROTOCOL_VERSION,
      transport: 'sse',
      endpoints: {
        sse: SSE_PATH,
        messages: MESSAGES_PATH
      }
    };
  });

  const sessions = registerSseRoutes(app, {
    clients,
    fetchTimeoutMs: config.fetchTimeoutMs,
    maxQueuedMessages: config.sseMaxQueuedMessages
  });

  // Injected clients belong to the caller.
  if (!options.clients) {
    app.addHook('onClose', async () => {
      closeHttpClients(clients);
    });
  }

  return { app, clients, sessions };
}
