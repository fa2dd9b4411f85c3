// src/services/output.broadcaster.ts
import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';

import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { AsyncQueue } from './async.queue';
import { OutputSink } from './run.log';
import { SubscriberOverflowError } from './runner.errors';
import { StreamEvent } from './runner.types';

export interface SubscribeOptions {
  capacity?: number;
}

/**
 * A live view of the broadcast. Only events published after subscribe()
 * are delivered; nothing is replayed.
 */
export class Subscription implements AsyncIterable<StreamEvent> {
  private readonly queue: AsyncQueue<StreamEvent>;

  constructor(readonly id: number, readonly capacity: number) {
    this.queue = new AsyncQueue<StreamEvent>(capacity);
  }

  get closed(): boolean {
    return this.queue.closed;
  }

  /** @internal */
  offer(event: StreamEvent): boolean {
    return this.queue.push(event);
  }

  /** @internal */
  end(err?: Error): void {
    if (err) this.queue.fail(err);
    else this.queue.end();
  }

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    return this.queue[Symbol.asyncIterator]();
  }
}

@Injectable()
export class OutputBroadcaster implements OnApplicationShutdown {
  private readonly logger = new Logger(OutputBroadcaster.name);
  private readonly subscribers = new Set<Subscription>();
  private sink: OutputSink | null = null;
  private nextSubscriberId = 1;

  constructor(@Inject(RUNNER_CONFIG) private readonly config: Pick<RunnerConfig, 'subscriberBuffer'>) {}

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /** Routes published events to the durable sink until detachSink(). */
  attachSink(sink: OutputSink): void {
    this.sink = sink;
  }

  detachSink(sink: OutputSink): void {
    if (this.sink === sink) this.sink = null;
  }

  /**
   * Writes the event to the sink, then hands it to every subscriber.
   * A sink failure propagates to the caller; a full subscriber is dropped.
   */
  publish(event: StreamEvent): void {
    this.sink?.write(event);

    for (const sub of this.subscribers) {
      if (sub.offer(event)) continue;

      this.subscribers.delete(sub);
      // consumer stopped iterating on its own
      if (sub.closed) continue;

      const err = new SubscriberOverflowError(sub.id, sub.capacity);
      this.logger.warn(err.message);
      sub.end(err);
    }
  }

  subscribe(options: SubscribeOptions = {}): Subscription {
    const sub = new Subscription(this.nextSubscriberId++, options.capacity ?? this.config.subscriberBuffer);
    this.subscribers.add(sub);
    this.logger.debug(`subscriber ${sub.id} joined (${this.subscribers.size} connected)`);
    return sub;
  }

  unsubscribe(sub: Subscription): void {
    if (!this.subscribers.delete(sub)) return;
    sub.end();
    this.logger.debug(`subscriber ${sub.id} left (${this.subscribers.size} connected)`);
  }

  /** Ends every live subscription. */
  closeAll(): void {
    for (const sub of this.subscribers) sub.end();
    this.subscribers.clear();
  }

  onApplicationShutdown(): void {
    this.closeAll();
  }
}
