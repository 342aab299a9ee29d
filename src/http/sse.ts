// This module registers the SSE session endpoint and the paired message POST endpoint.

import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { HttpClients } from '../fetcher/runtime.js';
import { isJsonRpcPayload } from '../mcp/protocol.js';
import { runSession } from '../mcp/session.js';
import { SseChannel } from '../transport/sse.js';
import { errorForLog } from '../utils/logger.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages/';

export interface SseRouteDeps {
  clients: HttpClients;
  fetchTimeoutMs: number | null;
  maxQueuedMessages: number;
}

export interface SseSessionView {
  readonly size: number;
  has(sessionId: string): boolean;
}

const messageQuerySchema = z.object({
  session_id: z.string().uuid()
});

// This function registers SSE routes and returns a read-only view of live sessions.
export function registerSseRoutes(fastify: FastifyInstance, deps: SseRouteDeps): SseSessionView {
  const channels = new Map<string, SseChannel>();
  const completions = new Set<Promise<void>>();

  fastify.get(SSE_PATH, async (request, reply) => {
    const sessionId = randomUUID();
    const logger = request.log.child({ component: 'sse', sessionId });

    reply.hijack();
    const channel = new SseChannel(reply.raw, {
      id: sessionId,
      logger,
      maxQueuedMessages: deps.maxQueuedMessages
    });
    channels.set(sessionId, channel);
    channel.open(`${MESSAGES_PATH}?session_id=${sessionId}`);

    logger.info({ event: 'sse_session_opened', activeSessions: channels.size }, 'sse_session_opened');

    const completion = runSession(channel, {
      clients: deps.clients,
      logger,
      fetchTimeoutMs: deps.fetchTimeoutMs
    }).then(
      (state) => {
        logger.info({ event: 'sse_session_finished', state }, 'sse_session_finished');
      },
      (error: unknown) => {
        logger.error({ event: 'sse_session_crashed', error: errorForLog(error) }, 'sse_session_crashed');
      }
    );
    completions.add(completion);
    void completion.finally(() => {
      channels.delete(sessionId);
      completions.delete(completion);
    });

    return reply;
  });

  fastify.post(MESSAGES_PATH, async (request, reply) => {
    const query = messageQuerySchema.safeParse(request.query);
    if (!query.success) {
      request.log.warn({ event: 'sse_message_invalid_session_id' }, 'sse_message_invalid_session_id');
      return reply.code(400).send({
        error: 'invalid_session_id',
        message: 'session_id query parameter must be the UUID issued by GET /sse.'
      });
    }

    const sessionId = query.data.session_id;
    const channel = channels.get(sessionId);
    if (!channel) {
      request.log.warn({ event: 'sse_message_session_not_found', sessionId }, 'sse_message_session_not_found');
      return reply.code(404).send({ error: 'session_not_found', message: 'Could not find session.' });
    }

    const payload: unknown = request.body;
    if (!isJsonRpcPayload(payload)) {
      request.log.warn({ event: 'sse_message_invalid_payload', sessionId }, 'sse_message_invalid_payload');
      return reply.code(400).send({ error: 'invalid_message', message: 'Body must be a JSON-RPC message.' });
    }

    const outcome = channel.deliver(payload);
    if (outcome === 'full') {
      request.log.warn({ event: 'sse_message_queue_full', sessionId }, 'sse_message_queue_full');
      return reply.code(429).send({ error: 'queue_full', message: 'Session is busy; retry later.' });
    }

    if (outcome === 'closed') {
      return reply.code(410).send({ error: 'session_closed', message: 'Session has closed.' });
    }

    return reply.code(202).send('Accepted');
  });

  // Open event streams would keep the listener from closing, so sessions are ended first.
  fastify.addHook('preClose', async () => {
    for (const channel of channels.values()) {
      channel.disconnect('server_closing');
    }
    await Promise.all(completions);
  });

  return {
    get size() {
      return channels.size;
    },
    has(sessionId: string) {
      return channels.has(sessionId);
    }
  };
}
