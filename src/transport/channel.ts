// This module implements the lifecycle shared by every transport: inbound queueing, cancellation, and exactly-once release.

import type { FastifyBaseLogger } from 'fastify';
import { AsyncQueue } from '../utils/async-queue.js';
import { AppError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import type { MessageChannel, OutboundMessage, TransportKind } from './types.js';

export interface ChannelOptions {
  id: string;
  logger: FastifyBaseLogger;
  maxQueuedMessages: number;
}

export abstract class QueuedMessageChannel implements MessageChannel {
  public abstract readonly kind: TransportKind;
  public readonly id: string;
  protected readonly logger: FastifyBaseLogger;
  protected readonly queue: AsyncQueue<unknown>;
  private readonly controller = new AbortController();
  private releasing: Promise<void> | null = null;

  protected constructor(options: ChannelOptions) {
    this.id = options.id;
    this.logger = options.logger;
    this.queue = new AsyncQueue<unknown>(options.maxQueuedMessages, () => this.onInboundSpace());
  }

  public get inbound(): AsyncIterable<unknown> {
    return this.queue;
  }

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get released(): boolean {
    return this.releasing !== null;
  }

  protected abstract writeFrame(message: OutboundMessage): Promise<void>;

  protected abstract releaseResources(): Promise<void>;

  // Transports that pause their reader while the queue is full resume here.
  protected onInboundSpace(): void {}

  public async send(message: OutboundMessage): Promise<void> {
    if (this.released || this.signal.aborted) {
      throw new AppError(503, 'transport_fault', 'Cannot send on a closed channel.', { channelId: this.id });
    }

    try {
      await this.writeFrame(message);
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new AppError(503, 'transport_fault', error instanceof Error ? error.message : 'Channel write failed.', {
        channelId: this.id
      });
    }
  }

  public disconnect(reason: string): void {
    if (!this.signal.aborted) {
      this.logger.info(
        {
          event: 'transport_disconnected',
          channelId: this.id,
          transport: this.kind,
          reason
        },
        'transport_disconnected'
      );
      this.controller.abort(new AppError(499, 'request_cancelled', `Channel disconnected: ${reason}`));
    }
    this.queue.end();
  }

  public release(): Promise<void> {
    if (this.releasing) {
      return this.releasing;
    }

    this.disconnect('released');
    this.releasing = this.releaseResources().then(
      () => {
        this.logger.info(
          {
            event: 'transport_released',
            channelId: this.id,
            transport: this.kind
          },
          'transport_released'
        );
      },
      (error: unknown) => {
        this.logger.error(
          {
            event: 'transport_release_failed',
            channelId: this.id,
            transport: this.kind,
            error: errorForLog(error)
          },
          'transport_release_failed'
        );
        throw error;
      }
    );
    return this.releasing;
  }
}
