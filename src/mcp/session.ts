// This module runs one MCP session: handshake state, sequential dispatch, and guaranteed channel release.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { HttpClients } from '../fetcher/runtime.js';
import type { MessageChannel } from '../transport/types.js';
import type { JsonRpcRequest, JsonRpcResponse, SessionState } from '../types/mcp.js';
import { AppError, isSessionFatal, normalizeError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import {
  JSON_RPC_INVALID_PARAMS,
  JSON_RPC_INVALID_REQUEST,
  JSON_RPC_METHOD_NOT_FOUND,
  appErrorToRpc,
  buildInitializeResult,
  isJsonRpcRequest,
  isJsonRpcResponse,
  rpcError,
  rpcResult
} from './protocol.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export interface SessionDeps {
  clients: HttpClients;
  logger: FastifyBaseLogger;
  // Deadline applied to every outbound fetch in this session; null means the client default.
  fetchTimeoutMs?: number | null;
}

export class McpSession {
  private currentState: SessionState = 'uninitialized';
  private readonly logger: FastifyBaseLogger;

  public constructor(
    private readonly channel: MessageChannel,
    private readonly deps: SessionDeps
  ) {
    this.logger = deps.logger.child({
      component: 'mcp_session',
      sessionId: channel.id,
      transport: channel.kind
    });
  }

  public get id(): string {
    return this.channel.id;
  }

  public get state(): SessionState {
    return this.currentState;
  }

  /**
   * Serves the channel until its inbound stream ends, the peer disconnects, or a
   * fatal error occurs. Requests are handled one at a time in arrival order.
   * Never rejects; the channel is released exactly once before it resolves.
   */
  public async run(): Promise<SessionState> {
    this.logger.info({ event: 'mcp_session_started' }, 'mcp_session_started');

    try {
      for await (const payload of this.channel.inbound) {
        if (this.channel.signal.aborted) {
          break;
        }

        const response = await this.handlePayload(payload);
        if (response && !this.channel.signal.aborted) {
          await this.channel.send(response);
        }
      }
    } catch (error) {
      await this.failSession(normalizeError(error));
    } finally {
      this.currentState = 'closed';
      try {
        await this.channel.release();
      } catch (releaseError) {
        this.logger.error(
          { event: 'mcp_session_release_failed', error: errorForLog(releaseError) },
          'mcp_session_release_failed'
        );
      }
    }

    this.logger.info({ event: 'mcp_session_closed' }, 'mcp_session_closed');
    return this.currentState;
  }

  // This method handles one decoded inbound value, which may be a batch.
  public async handlePayload(payload: unknown): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
    if (!Array.isArray(payload)) {
      return this.handleMessage(payload);
    }

    if (payload.length === 0) {
      return rpcError(null, JSON_RPC_INVALID_REQUEST, 'Empty JSON-RPC batch.');
    }

    const responses: JsonRpcResponse[] = [];
    for (const item of payload) {
      const response = await this.handleMessage(item);
      if (response) {
        responses.push(response);
      }
    }
    return responses.length > 0 ? responses : null;
  }

  private async handleMessage(message: unknown): Promise<JsonRpcResponse | null> {
    if (isJsonRpcRequest(message)) {
      return this.handleRequest(message);
    }

    if (isJsonRpcResponse(message)) {
      this.logger.debug({ event: 'mcp_peer_response_ignored', rpcRequestId: message.id }, 'mcp_peer_response_ignored');
      return null;
    }

    this.logger.warn({ event: 'mcp_invalid_request_object' }, 'mcp_invalid_request_object');
    return rpcError(null, JSON_RPC_INVALID_REQUEST, 'Invalid JSON-RPC request object.');
  }

  private async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const isNotification = request.id === undefined;
    const requestId = request.id ?? null;
    const startedAt = Date.now();
    const rpcTraceId = randomUUID();

    this.logger.info(
      {
        event: 'mcp_rpc_request_received',
        rpcTraceId,
        rpcRequestId: requestId,
        method: request.method,
        state: this.currentState
      },
      'mcp_rpc_request_received'
    );

    try {
      const result = await this.dispatch(request);
      if (isNotification) {
        return null;
      }
      return result.kind === 'error' ? result.response : rpcResult(requestId, result.value);
    } catch (error) {
      const appError = normalizeError(error);
      if (isSessionFatal(appError)) {
        throw appError;
      }

      this.logger.warn(
        {
          event: 'mcp_rpc_request_failed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          code: appError.code,
          statusCode: appError.statusCode,
          details: sanitizeForLog(appError.details),
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_failed'
      );

      return isNotification ? null : appErrorToRpc(requestId, appError);
    } finally {
      this.logger.info(
        {
          event: 'mcp_rpc_request_completed',
          rpcTraceId,
          rpcRequestId: requestId,
          method: request.method,
          durationMs: Date.now() - startedAt
        },
        'mcp_rpc_request_completed'
      );
    }
  }

  private async dispatch(
    request: JsonRpcRequest
  ): Promise<{ kind: 'result'; value: unknown } | { kind: 'error'; response: JsonRpcResponse }> {
    const requestId = request.id ?? null;

    switch (request.method) {
      case 'initialize': {
        this.currentState = 'initialized';
        return { kind: 'result', value: buildInitializeResult(request.params?.protocolVersion) };
      }

      case 'notifications/initialized':
      case 'ping': {
        return { kind: 'result', value: {} };
      }

      case 'tools/list': {
        this.assertInitialized(request.method);
        return { kind: 'result', value: { tools: buildToolList() } };
      }

      case 'tools/call': {
        this.assertInitialized(request.method);
        const name = request.params?.name;
        if (typeof name !== 'string') {
          return {
            kind: 'error',
            response: rpcError(requestId, JSON_RPC_INVALID_PARAMS, 'tools/call requires params.name as string.')
          };
        }

        const value = await executeTool(name, request.params?.arguments, {
          sessionId: this.channel.id,
          clients: this.deps.clients,
          logger: this.logger,
          signal: this.channel.signal,
          timeoutMs: this.deps.fetchTimeoutMs
        });
        return { kind: 'result', value };
      }

      default:
        return {
          kind: 'error',
          response: rpcError(requestId, JSON_RPC_METHOD_NOT_FOUND, `Unknown method: ${request.method}`)
        };
    }
  }

  private assertInitialized(method: string): void {
    if (this.currentState !== 'initialized') {
      throw new AppError(409, 'session_not_initialized', `${method} requires a completed initialize handshake.`, {
        method
      });
    }
  }

  // The peer gets one last error frame when the channel can still carry it; then the session closes.
  private async failSession(error: AppError): Promise<void> {
    this.logger.error(
      {
        event: 'mcp_session_failed',
        code: error.code,
        details: sanitizeForLog(error.details),
        error: errorForLog(error)
      },
      'mcp_session_failed'
    );

    if (error.code === 'transport_fault' || this.channel.signal.aborted) {
      return;
    }

    try {
      await this.channel.send(appErrorToRpc(null, error));
    } catch (sendError) {
      this.logger.warn(
        { event: 'mcp_session_final_error_not_sent', error: errorForLog(sendError) },
        'mcp_session_final_error_not_sent'
      );
    }
  }
}

export function runSession(channel: MessageChannel, deps: SessionDeps): Promise<SessionState> {
  return new McpSession(channel, deps).run();
}
