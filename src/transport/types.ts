// This file defines the transport-agnostic channel contract consumed by the session loop.

import type { JsonRpcResponse } from '../types/mcp.js';

export type TransportKind = 'stdio' | 'sse';

export type OutboundMessage = JsonRpcResponse | JsonRpcResponse[];

export interface MessageChannel {
  readonly id: string;
  readonly kind: TransportKind;
  // Decoded JSON values from the peer; fails with a protocol_violation AppError on unparseable frames.
  readonly inbound: AsyncIterable<unknown>;
  // Aborted once the peer is gone.
  readonly signal: AbortSignal;
  readonly released: boolean;
  send(message: OutboundMessage): Promise<void>;
  // Aborts in-flight work and ends the inbound stream without releasing resources.
  disconnect(reason: string): void;
  // Idempotent; the underlying resources are released on the first call only.
  release(): Promise<void>;
}
