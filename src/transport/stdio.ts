// This module binds one session to newline-delimited JSON-RPC on a readable/writable stream pair.

import { randomUUID } from 'node:crypto';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { FastifyBaseLogger } from 'fastify';
import { normalizeError } from '../utils/errors.js';
import { parseJsonFrame } from '../utils/json.js';
import { QueuedMessageChannel } from './channel.js';
import type { OutboundMessage } from './types.js';

export interface StdioChannelOptions {
  logger: FastifyBaseLogger;
  input?: Readable;
  output?: Writable;
  maxQueuedMessages?: number;
}

const DEFAULT_STDIO_QUEUE = 64;

export class StdioChannel extends QueuedMessageChannel {
  public readonly kind = 'stdio' as const;
  private readonly reader: Interface;
  private readonly output: Writable;
  private readonly onOutputError: (error: Error) => void;

  public constructor(options: StdioChannelOptions) {
    super({
      id: randomUUID(),
      logger: options.logger,
      maxQueuedMessages: options.maxQueuedMessages ?? DEFAULT_STDIO_QUEUE
    });

    this.output = options.output ?? process.stdout;
    this.reader = createInterface({
      input: options.input ?? process.stdin,
      crlfDelay: Infinity,
      terminal: false
    });

    this.reader.on('line', (line) => this.onLine(line));
    // End of input lets already-received requests finish before the session closes.
    this.reader.on('close', () => this.queue.end());

    this.onOutputError = (error: Error) => {
      this.logger.error(
        {
          event: 'stdio_output_error',
          channelId: this.id,
          message: error.message
        },
        'stdio_output_error'
      );
      this.disconnect('stdout_error');
    };
    this.output.on('error', this.onOutputError);
  }

  private onLine(line: string): void {
    const trimmed = line.trim();
    if (trimmed.length === 0 || this.queue.isEnded) {
      return;
    }

    let payload: unknown;
    try {
      payload = parseJsonFrame(trimmed, 'stdin');
    } catch (error) {
      this.queue.fail(normalizeError(error));
      this.reader.close();
      return;
    }

    if (!this.queue.push(payload)) {
      this.reader.pause();
    }
  }

  protected override onInboundSpace(): void {
    if (!this.queue.isEnded) {
      this.reader.resume();
    }
  }

  protected writeFrame(message: OutboundMessage): Promise<void> {
    const frame = `${JSON.stringify(message)}\n`;
    return new Promise((resolve, reject) => {
      this.output.write(frame, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  // Stdout itself stays open: other code in the process may still own it.
  protected async releaseResources(): Promise<void> {
    this.reader.close();
    this.output.off('error', this.onOutputError);
  }
}
