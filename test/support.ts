// This module provides in-process stand-ins shared by the session and transport test suites.

import type { AddressInfo } from 'node:net';
import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { ClientPolicy, HttpClient, HttpGetOptions, HttpTextResponse } from '../src/fetcher/client.js';
import type { HttpClients } from '../src/fetcher/runtime.js';
import { QueuedMessageChannel } from '../src/transport/channel.js';
import type { OutboundMessage } from '../src/transport/types.js';
import { AsyncQueue } from '../src/utils/async-queue.js';

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

// This channel keeps inbound and outbound traffic in memory so session behavior can be driven directly.
export class MemoryChannel extends QueuedMessageChannel {
  public readonly kind = 'stdio' as const;
  public readonly outbox = new AsyncQueue<OutboundMessage>(Number.POSITIVE_INFINITY);
  public readonly sent: OutboundMessage[] = [];
  public releaseCount = 0;

  public constructor(id = 'memory-session', maxQueuedMessages = 16) {
    super({ id, logger: silentLogger(), maxQueuedMessages });
  }

  public deliver(payload: unknown): void {
    this.queue.push(payload);
  }

  // Finishes the inbound stream the way stdin EOF does.
  public endInbound(): void {
    this.queue.end();
  }

  public async nextMessage(): Promise<OutboundMessage> {
    const result = await this.outbox.next();
    if (result.done) {
      throw new Error('Channel closed before another message was sent.');
    }
    return result.value;
  }

  protected async writeFrame(message: OutboundMessage): Promise<void> {
    this.sent.push(message);
    this.outbox.push(message);
  }

  protected async releaseResources(): Promise<void> {
    this.releaseCount += 1;
    this.outbox.end();
  }
}

type GetTextHandler = (url: string, options: HttpGetOptions) => Promise<HttpTextResponse>;

export class FakeHttpClient implements HttpClient {
  public readonly calls: string[] = [];

  public constructor(
    public readonly policy: ClientPolicy,
    private readonly handler: GetTextHandler
  ) {}

  public getText(url: string, options: HttpGetOptions = {}): Promise<HttpTextResponse> {
    this.calls.push(url);
    return this.handler(url, options);
  }

  public close(): void {}
}

export function fakeClients(handler: GetTextHandler): { clients: HttpClients; default: FakeHttpClient; secure: FakeHttpClient } {
  const defaultClient = new FakeHttpClient('default', handler);
  const secureClient = new FakeHttpClient('secure', handler);
  return {
    clients: { default: defaultClient, secure: secureClient },
    default: defaultClient,
    secure: secureClient
  };
}

export function textResponse(url: string, text: string): HttpTextResponse {
  return { url, status: 200, text };
}

export function listeningPort(server: { address(): AddressInfo | string | null }): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port.');
  }
  return address.port;
}
