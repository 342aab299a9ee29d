// This module binds one session to a Server-Sent-Events response plus POSTed inbound messages.

import type { ServerResponse } from 'node:http';
import type { FastifyBaseLogger } from 'fastify';
import { QueuedMessageChannel } from './channel.js';
import type { OutboundMessage } from './types.js';

export interface SseChannelOptions {
  id: string;
  logger: FastifyBaseLogger;
  maxQueuedMessages: number;
}

export type DeliveryOutcome = 'accepted' | 'full' | 'closed';

export class SseChannel extends QueuedMessageChannel {
  public readonly kind = 'sse' as const;
  private readonly response: ServerResponse;
  private readonly onResponseClose: () => void;

  public constructor(response: ServerResponse, options: SseChannelOptions) {
    super(options);
    this.response = response;
    this.onResponseClose = () => this.disconnect('peer_closed');
    this.response.on('close', this.onResponseClose);
  }

  // This method starts the event stream and announces where the peer should POST its messages.
  public open(messagesEndpoint: string): void {
    this.response.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no'
    });
    this.response.write(formatEvent('endpoint', messagesEndpoint));
  }

  // POSTs never wait on the session: a full queue is reported back to the peer instead.
  public deliver(payload: unknown): DeliveryOutcome {
    if (this.queue.isEnded || this.signal.aborted) {
      return 'closed';
    }

    if (this.queue.isFull) {
      return 'full';
    }

    this.queue.push(payload);
    return 'accepted';
  }

  protected writeFrame(message: OutboundMessage): Promise<void> {
    const frame = formatEvent('message', JSON.stringify(message));
    return new Promise((resolve, reject) => {
      this.response.write(frame, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  protected async releaseResources(): Promise<void> {
    this.response.off('close', this.onResponseClose);
    if (!this.response.writableEnded) {
      this.response.end();
    }
  }
}

// Each data line carries one line of payload; JSON.stringify output never spans lines.
export function formatEvent(event: string, data: string): string {
  const dataLines = data
    .split(/\r?\n/)
    .map((line) => `data: ${line}`)
    .join('\n');
  return `event: ${event}\n${dataLines}\n\n`;
}
