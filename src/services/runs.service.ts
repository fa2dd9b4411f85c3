// src/services/runs.service.ts
import { BeforeApplicationShutdown, Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs-extra';
import * as path from 'path';

import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { EXECUTION_BACKENDS, ExecutionBackends, ProcessHandle } from './backends/execution.backend';
import { OutputBroadcaster } from './output.broadcaster';
import { RunLog } from './run.log';
import {
  AlreadyRunningError,
  InvalidWorkingDirectoryError,
  StepExecutionError,
  errorMessage,
  isInfrastructureError,
} from './runner.errors';
import {
  BackendKind,
  EXIT_INFRASTRUCTURE_FAILURE,
  EXIT_STOPPED,
  RunState,
  RunStatusView,
  RunSummary,
  STOPPED_REASON,
  StepDefinition,
  StepResult,
  StepSummary,
  StopOutcome,
  formatCommand,
  isTerminalRunState,
} from './runner.types';
import { STEP_TABLE } from './step.table';

export interface StartRunRequest {
  workingDirectory: string;
  backend?: BackendKind;
}

type RunFailure =
  | { kind: 'infrastructure'; stepName: string; reason: string }
  | { kind: 'step'; error: StepExecutionError };

/** Everything the worker owns for one run. Never handed out of this service. */
interface Run {
  id: string;
  workingDirectory: string;
  backend: BackendKind;
  state: RunState;
  steps: StepResult[];
  startedAt: Date;
  endedAt?: Date;
  log: RunLog;
  backendHandle: ProcessHandle | null;
  activeStep: string | null;
  stopRequested: boolean;
  failure: RunFailure | null;
  summary: RunSummary | null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** run_YYYYMMDD_HHMMSS in local time */
export function timestampRunId(now: Date): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `run_${date}_${time}`;
}

/** Timestamp ids; a second id within the same second gets a _2, _3, ... suffix. */
export class RunIdSequence {
  private lastBase = '';
  private count = 0;

  next(now: Date): string {
    const base = timestampRunId(now);
    if (base !== this.lastBase) {
      this.lastBase = base;
      this.count = 1;
      return base;
    }
    this.count += 1;
    return `${base}_${this.count}`;
  }
}

@Injectable()
export class RunsService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(RunsService.name);
  private current: Run | null = null;
  private currentDone: Promise<RunSummary> | null = null;
  private readonly runIds = new RunIdSequence();

  constructor(
    @Inject(STEP_TABLE) private readonly stepTable: readonly StepDefinition[],
    @Inject(EXECUTION_BACKENDS) private readonly backends: ExecutionBackends,
    private readonly broadcaster: OutputBroadcaster,
    @Inject(RUNNER_CONFIG) private readonly config: Pick<RunnerConfig, 'backend' | 'logFileName' | 'local' | 'container'>,
  ) {}

  /**
   * Accepts a run and starts its worker. Resolves as soon as the run is
   * registered; the pipeline keeps going in the background.
   */
  async start(request: StartRunRequest): Promise<{ runId: string; logFile: string }> {
    this.assertIdle();
    const workingDirectory = path.resolve(request.workingDirectory);
    await this.assertUsableDirectory(workingDirectory);

    // check-and-set of the run slot; nothing below awaits until the run is registered
    this.assertIdle();

    const backend = request.backend ?? this.config.backend;
    const startedAt = new Date();
    const id = this.runIds.next(startedAt);
    const logFile = path.join(workingDirectory, this.config.logFileName);
    const log = RunLog.open(logFile, { runId: id, workingDirectory, backend, startedAt });

    const run: Run = {
      id,
      workingDirectory,
      backend,
      state: 'Running',
      steps: this.stepTable.map((step) => ({ name: step.name, status: 'Pending' })),
      startedAt,
      log,
      backendHandle: null,
      activeStep: null,
      stopRequested: false,
      failure: null,
      summary: null,
    };
    this.current = run;
    this.broadcaster.attachSink(log);

    this.logger.log(`[${id}] started in ${workingDirectory} (${backend} backend)`);
    this.currentDone = this.execute(run);
    return { runId: id, logFile };
  }

  /**
   * Stops the active run and resolves once it is terminal. Safe to repeat:
   * later calls resolve the same terminal state.
   */
  async stop(): Promise<StopOutcome> {
    const run = this.current;
    const done = this.currentDone;
    if (!run || !done) return { accepted: false, state: 'Idle' };

    if (isTerminalRunState(run.state)) {
      return { accepted: run.state === 'Stopped', state: run.state };
    }

    if (!run.stopRequested) {
      run.stopRequested = true;
      this.logger.log(`[${run.id}] stop requested${run.activeStep ? ` during ${run.activeStep}` : ''}`);
      const handle = run.backendHandle;
      if (handle) {
        await this.stopHandle(run, handle);
      }
    }

    await done;
    return { accepted: run.state === 'Stopped', state: run.state };
  }

  status(): RunStatusView {
    const run = this.current;
    if (!run) return { state: 'Idle', steps: this.stepTable.map((step) => ({ name: step.name, status: 'Pending' })) };

    return {
      state: run.state,
      runId: run.id,
      activeStep: run.state === 'Running' && run.activeStep ? run.activeStep : undefined,
      workingDirectory: run.workingDirectory,
      startedAt: run.startedAt,
      endedAt: run.endedAt,
      exitCode: run.summary?.exitCode,
      reason: run.summary?.reason,
      steps: run.steps.map(toSummary),
    };
  }

  /** Summary of the current run once it is terminal; undefined when idle. */
  async waitForRun(): Promise<RunSummary | undefined> {
    return this.currentDone ?? undefined;
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    if (this.current?.state !== 'Running') return;
    this.logger.warn(`[${this.current.id}] stopping active run on shutdown${signal ? ` (${signal})` : ''}`);
    await this.stop();
  }

  /** The run's worker. Never rejects: every failure ends up in the summary. */
  private async execute(run: Run): Promise<RunSummary> {
    try {
      this.broadcaster.publish({
        type: 'run-started',
        runId: run.id,
        workingDirectory: run.workingDirectory,
        backend: run.backend,
        startedAt: run.startedAt,
      });

      for (const [index, step] of this.stepTable.entries()) {
        if (run.stopRequested) break;
        const proceed = await this.runStep(run, step, run.steps[index]);
        if (!proceed) break;
      }
    } catch (err) {
      // anything unexpected is treated like a backend failure of the active step
      const stepName = run.activeStep ?? 'pipeline';
      this.logger.error(`[${run.id}] ${stepName} crashed: ${errorMessage(err)}`, err instanceof Error ? err.stack : undefined);
      const active = run.steps.find((s) => s.name === run.activeStep);
      if (active && active.status === 'Running') {
        try {
          this.finishStep(run, active, 'Failed', EXIT_INFRASTRUCTURE_FAILURE, errorMessage(err));
        } catch (publishErr) {
          // finishStep updates the result before publishing, so only the event is lost
          this.logger.error(`[${run.id}] could not record end of ${active.name}: ${errorMessage(publishErr)}`);
        }
      }
      run.failure ??= { kind: 'infrastructure', stepName, reason: errorMessage(err) };
      await this.releaseHandle(run);
    }

    return this.finishRun(run);
  }

  /** Runs one step to its terminal status. Returns false when the pipeline must halt. */
  private async runStep(run: Run, step: StepDefinition, result: StepResult): Promise<boolean> {
    result.status = 'Running';
    result.startedAt = new Date();
    run.activeStep = step.name;
    this.broadcaster.publish({
      type: 'step-started',
      runId: run.id,
      stepName: step.name,
      command: formatCommand(step.command),
    });

    const backend = this.backends[run.backend];
    let handle: ProcessHandle;
    try {
      handle = await backend.start(step.command, run.workingDirectory, { SIM_RUN_ID: run.id });
    } catch (err) {
      if (!isInfrastructureError(err)) throw err;

      // infrastructure failures halt the run whatever the step's policy
      this.logger.error(`[${run.id}] ${step.name} could not start: ${err.message}`);
      this.finishStep(run, result, 'Failed', EXIT_INFRASTRUCTURE_FAILURE, err.message);
      run.failure = { kind: 'infrastructure', stepName: step.name, reason: err.message };
      return false;
    }

    run.backendHandle = handle;
    if (run.stopRequested) {
      // stop() arrived while the backend was starting the process
      await this.stopHandle(run, handle);
    }

    for await (const output of handle.lines()) {
      this.broadcaster.publish({
        type: 'output',
        line: {
          runId: run.id,
          stepName: step.name,
          timestampMonotonic: output.timestampMonotonic,
          text: output.text,
          channel: output.channel,
        },
      });
    }

    let exitCode: number;
    try {
      exitCode = await handle.wait();
    } catch (err) {
      if (!run.stopRequested) throw err;
      // the substrate may report the kill itself as a failure
      exitCode = EXIT_STOPPED;
    }
    run.backendHandle = null;

    if (run.stopRequested && exitCode !== 0) {
      this.finishStep(run, result, 'Failed', exitCode, STOPPED_REASON);
      return false;
    }

    if (exitCode === 0) {
      this.finishStep(run, result, 'Completed', exitCode);
      return !run.stopRequested;
    }

    if (step.failurePolicy === 'ContinueOnFailure') {
      this.logger.warn(`[${run.id}] ${step.name} exited with ${exitCode}; continuing`);
      this.finishStep(run, result, 'Failed', exitCode, `exited with code ${exitCode} (continue on failure)`);
      return true;
    }

    const error = new StepExecutionError(step.name, exitCode);
    this.logger.warn(`[${run.id}] ${error.message}; aborting pipeline`);
    this.finishStep(run, result, 'Failed', exitCode, error.message);
    run.failure = { kind: 'step', error };
    return false;
  }

  private finishStep(run: Run, result: StepResult, status: 'Completed' | 'Failed', exitCode: number, reason?: string): void {
    result.status = status;
    result.exitCode = exitCode;
    result.reason = reason;
    result.endedAt = new Date();
    run.activeStep = null;
    this.broadcaster.publish({
      type: 'step-finished',
      runId: run.id,
      stepName: result.name,
      status,
      exitCode,
      reason,
    });
  }

  private finishRun(run: Run): RunSummary {
    for (const step of run.steps) {
      if (step.status === 'Pending') step.status = 'Skipped';
    }

    let state: RunState;
    let exitCode: number;
    let reason: string | undefined;
    if (run.failure?.kind === 'infrastructure') {
      state = 'Failed';
      exitCode = EXIT_INFRASTRUCTURE_FAILURE;
      reason = `${run.failure.stepName}: ${run.failure.reason}`;
    } else if (run.stopRequested) {
      state = 'Stopped';
      exitCode = EXIT_STOPPED;
      const interrupted = run.steps.find((step) => step.reason === STOPPED_REASON);
      reason = interrupted ? `stopped during ${interrupted.name}` : STOPPED_REASON;
    } else if (run.failure?.kind === 'step') {
      state = 'Failed';
      exitCode = run.failure.error.exitCode;
      reason = run.failure.error.message;
    } else {
      state = 'Completed';
      exitCode = 0;
    }

    const endedAt = new Date();
    run.state = state;
    run.endedAt = endedAt;
    run.activeStep = null;

    const summary: RunSummary = {
      runId: run.id,
      state,
      workingDirectory: run.workingDirectory,
      backend: run.backend,
      logFile: run.log.file,
      startedAt: run.startedAt,
      endedAt,
      durationMs: endedAt.getTime() - run.startedAt.getTime(),
      exitCode,
      reason,
      steps: run.steps.map(toSummary),
    };
    run.summary = summary;

    try {
      // the log sink writes the trailer when it sees run-finished
      this.broadcaster.publish({ type: 'run-finished', summary });
    } catch (err) {
      this.logger.error(`[${run.id}] could not record run end: ${errorMessage(err)}`);
    }
    this.broadcaster.detachSink(run.log);
    try {
      run.log.close(summary);
    } catch (err) {
      this.logger.error(`[${run.id}] could not close ${run.log.file}: ${errorMessage(err)}`);
    }

    const log = `[${run.id}] ${state} after ${(summary.durationMs / 1000).toFixed(2)}s (exit ${exitCode})`;
    if (state === 'Completed') this.logger.log(log);
    else this.logger.warn(reason ? `${log}: ${reason}` : log);
    return summary;
  }

  private async stopHandle(run: Run, handle: ProcessHandle): Promise<void> {
    const grace = run.backend === 'local' ? this.config.local.stopGraceMs : this.config.container.stopGraceMs;
    try {
      await handle.stop(grace);
    } catch (err) {
      this.logger.error(`[${run.id}] stopping ${run.activeStep ?? 'step'} failed: ${errorMessage(err)}`);
    }
  }

  /** Best-effort teardown after an unexpected failure. */
  private async releaseHandle(run: Run): Promise<void> {
    const handle = run.backendHandle;
    run.backendHandle = null;
    if (handle) await this.stopHandle(run, handle);
  }

  private assertIdle(): void {
    if (this.current?.state === 'Running') {
      throw new AlreadyRunningError(this.current.id);
    }
  }

  private async assertUsableDirectory(dir: string): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.stat(dir);
    } catch (err) {
      throw new InvalidWorkingDirectoryError(dir, errorMessage(err));
    }
    if (!stat.isDirectory()) {
      throw new InvalidWorkingDirectoryError(dir, 'not a directory');
    }
    try {
      await fs.access(dir, fs.constants.W_OK);
    } catch {
      throw new InvalidWorkingDirectoryError(dir, 'not writable');
    }
  }
}

function toSummary(step: StepResult): StepSummary {
  const summary: StepSummary = { name: step.name, status: step.status };
  if (step.exitCode !== undefined) summary.exitCode = step.exitCode;
  if (step.reason !== undefined) summary.reason = step.reason;
  return summary;
}
