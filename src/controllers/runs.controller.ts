// src/controllers/runs.controller.ts
import { Body, Controller, Get, HttpCode, Logger, MessageEvent, Post, Sse, UseFilters } from '@nestjs/common';
import { Observable } from 'rxjs';
import { z } from 'zod';

import { RunnerExceptionFilter } from '../filters/runner-exception.filter';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { OutputBroadcaster, Subscription } from '../services/output.broadcaster';
import { SubscriberOverflowError } from '../services/runner.errors';
import { RunStatusView, StopOutcome } from '../services/runner.types';
import { RunsService } from '../services/runs.service';

export const startRunSchema = z.object({
  workingDirectory: z.string().trim().min(1, 'workingDirectory is required'),
  backend: z.enum(['local', 'container']).optional(),
});

export type StartRunBody = z.infer<typeof startRunSchema>;

@Controller()
@UseFilters(RunnerExceptionFilter)
export class RunsController {
  private readonly logger = new Logger(RunsController.name);

  constructor(private runs: RunsService, private broadcaster: OutputBroadcaster) {}

  @Post('run')
  async start(@Body(new ZodValidationPipe(startRunSchema)) body: StartRunBody): Promise<{ runId: string }> {
    const { runId } = await this.runs.start(body);
    return { runId };
  }

  @Post('stop')
  @HttpCode(200)
  async stop(): Promise<StopOutcome> {
    return this.runs.stop();
  }

  @Get('status')
  status(): RunStatusView {
    return this.runs.status();
  }

  /** Live feed of everything published from the moment of connection. */
  @Sse('stream')
  stream(): Observable<MessageEvent> {
    return new Observable<MessageEvent>((subscriber) => {
      const sub = this.broadcaster.subscribe();
      this.relay(sub, (event) => subscriber.next(event))
        .then(() => subscriber.complete())
        .catch((err: unknown) => subscriber.error(err));
      return () => this.broadcaster.unsubscribe(sub);
    });
  }

  private async relay(sub: Subscription, emit: (event: MessageEvent) => void): Promise<void> {
    try {
      for await (const event of sub) {
        emit({ type: event.type, data: event });
      }
    } catch (err) {
      if (!(err instanceof SubscriberOverflowError)) throw err;
      this.logger.warn(`stream subscriber dropped: ${err.message}`);
      emit({ type: 'overflow', data: { message: err.message } });
    }
  }
}
