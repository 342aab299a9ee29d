// This file defines minimal JSON-RPC and MCP protocol payload types shared by both transports.

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId | null;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError;
}

export type JsonRpcMessage = JsonRpcRequest | JsonRpcResponse;

export interface McpTool {
  name: string;
  title: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface TextContentBlock {
  type: 'text';
  text: string;
}

// Only text blocks are produced today; new variants join this union.
export type ContentBlock = TextContentBlock;

export interface ToolCallResult {
  content: ContentBlock[];
}

export type SessionState = 'uninitialized' | 'initialized' | 'closed';
