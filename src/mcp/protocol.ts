// This module holds JSON-RPC framing helpers and the mapping from application errors to JSON-RPC error codes.

import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from '../types/mcp.js';
import type { AppError, AppErrorCode } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';

export const JSON_RPC_PARSE_ERROR = -32700;
export const JSON_RPC_INVALID_REQUEST = -32600;
export const JSON_RPC_METHOD_NOT_FOUND = -32601;
export const JSON_RPC_INVALID_PARAMS = -32602;
export const JSON_RPC_INTERNAL_ERROR = -32603;

export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = ['2024-11-05', MCP_PROTOCOL_VERSION, '2025-06-18'];

const RPC_CODE_BY_APP_CODE: Record<AppErrorCode, number> = {
  protocol_violation: JSON_RPC_PARSE_ERROR,
  session_not_initialized: -32002,
  unknown_tool: JSON_RPC_METHOD_NOT_FOUND,
  missing_argument: JSON_RPC_INVALID_PARAMS,
  invalid_argument: JSON_RPC_INVALID_PARAMS,
  upstream_http_error: -32010,
  upstream_unreachable: -32011,
  upstream_timeout: -32012,
  request_cancelled: -32800,
  transport_fault: JSON_RPC_INTERNAL_ERROR,
  invalid_config: JSON_RPC_INTERNAL_ERROR,
  internal_error: JSON_RPC_INTERNAL_ERROR
};

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    error: data === undefined ? { code, message } : { code, message, data }
  };
}

export function rpcResult(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id,
    result
  };
}

// Every error response carries the machine-readable kind next to its details.
export function appErrorToRpc(id: JsonRpcId | null, error: AppError): JsonRpcResponse {
  return rpcError(id, RPC_CODE_BY_APP_CODE[error.code], error.message, {
    ...(error.details ?? {}),
    kind: error.code
  });
}

function isJsonRpcId(value: unknown): value is JsonRpcId | null {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

// This helper validates that a payload is structurally a JSON-RPC request or notification.
export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (!isPlainObject(value)) {
    return false;
  }

  return (
    value.jsonrpc === '2.0' &&
    typeof value.method === 'string' &&
    (value.id === undefined || isJsonRpcId(value.id)) &&
    (value.params === undefined || isPlainObject(value.params))
  );
}

// Peers may answer server-initiated requests; this server never sends any, so these are only recognised.
export function isJsonRpcResponse(value: unknown): value is JsonRpcResponse {
  if (!isPlainObject(value)) {
    return false;
  }

  return value.jsonrpc === '2.0' && isJsonRpcId(value.id) && ('result' in value || 'error' in value);
}

// This helper accepts single messages and non-empty batches; anything else is rejected before it reaches a session.
export function isJsonRpcPayload(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return isJsonRpcRequest(value) || isJsonRpcResponse(value);
}

export function negotiateProtocolVersion(requested: unknown): string {
  if (typeof requested === 'string' && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)) {
    return requested;
  }
  return MCP_PROTOCOL_VERSION;
}

export function buildInitializeResult(requestedVersion: unknown): Record<string, unknown> {
  return {
    protocolVersion: negotiateProtocolVersion(requestedVersion),
    capabilities: {
      tools: {
        listChanged: false
      }
    },
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    }
  };
}
