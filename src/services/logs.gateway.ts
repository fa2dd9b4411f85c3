// src/services/logs.gateway.ts
import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';
import http from 'http';
import { Server, Socket } from 'socket.io';

import { OutputBroadcaster, Subscription } from './output.broadcaster';
import { SubscriberOverflowError, errorMessage } from './runner.errors';
import { StreamEvent } from './runner.types';

export type Emit = (event: string, payload: unknown) => void;

/** Socket.IO payload for a broadcaster event; null when it has no socket counterpart. */
export function toSocketMessage(event: StreamEvent): { event: string; payload: unknown } | null {
  switch (event.type) {
    case 'output':
      return {
        event: 'output',
        payload: {
          data: event.line.text,
          timestamp: event.line.timestampMonotonic,
          run_id: event.line.runId,
          step: event.line.stepName ?? null,
          channel: event.line.channel,
        },
      };
    case 'step-started':
      return { event: 'step', payload: { run_id: event.runId, step: event.stepName, status: 'Running' } };
    case 'step-finished':
      return {
        event: 'step',
        payload: { run_id: event.runId, step: event.stepName, status: event.status, exit_code: event.exitCode ?? null },
      };
    case 'run-finished':
      return {
        event: 'simulation_complete',
        payload: {
          run_id: event.summary.runId,
          state: event.summary.state,
          exit_code: event.summary.exitCode,
          duration: event.summary.durationMs / 1000,
          log_file: event.summary.logFile,
          reason: event.summary.reason ?? null,
          steps: event.summary.steps,
        },
      };
    case 'run-started':
      return { event: 'simulation_started', payload: { run_id: event.runId, backend: event.backend } };
  }
}

/**
 * Relays the output broadcast to Socket.IO clients. Every socket gets its own
 * bounded subscription; a socket that falls behind is told so and disconnected.
 */
@Injectable()
export class LogsGateway implements BeforeApplicationShutdown {
  private readonly logger = new Logger(LogsGateway.name);
  io: Server | null = null;

  constructor(private readonly broadcaster: OutputBroadcaster) {}

  attach(server: http.Server): Server {
    this.io = new Server(server, {
      cors: { origin: '*' },
    });
    this.io.on('connection', (socket) => this.handleConnection(socket));
    return this.io;
  }

  handleConnection(socket: Socket): void {
    const sub = this.broadcaster.subscribe();
    this.logger.debug(`socket ${socket.id} connected as subscriber ${sub.id}`);
    socket.on('disconnect', () => this.broadcaster.unsubscribe(sub));

    this.relay(sub, (event, payload) => socket.emit(event, payload), () => socket.disconnect(true)).catch((err: unknown) =>
      this.logger.error(`socket ${socket.id} relay failed: ${errorMessage(err)}`),
    );
  }

  /** Forwards events until the subscription ends; returns false if it overflowed. */
  async relay(sub: Subscription, emit: Emit, drop: () => void): Promise<boolean> {
    try {
      for await (const event of sub) {
        const message = toSocketMessage(event);
        if (message) emit(message.event, message.payload);
      }
      return true;
    } catch (err) {
      if (!(err instanceof SubscriberOverflowError)) throw err;
      emit('dropped', { message: err.message });
      drop();
      return false;
    }
  }

  async beforeApplicationShutdown(): Promise<void> {
    const io = this.io;
    if (!io) return;
    this.io = null;
    await new Promise<void>((resolve) => io.close(() => resolve()));
  }
}
