// src/services/backends/local.backend.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChildProcess, spawn } from 'child_process';
import { Readable } from 'stream';

import { RUNNER_CONFIG, RunnerConfig } from '../../config/runner.config';
import { AsyncQueue } from '../async.queue';
import { BackendUnavailableError, CommandNotFoundError, errorCode, errorMessage } from '../runner.errors';
import { OutputChannel, StepCommand, formatCommand } from '../runner.types';
import { settlesWithin } from '../timeouts';
import { ExecutionBackend, ProcessHandle, ProcessOutput, withEnvScript } from './execution.backend';
import { readLines } from './line.reader';

const MISSING_COMMAND_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

// own process group, so stop() also reaches whatever the step spawned
const USE_PROCESS_GROUP = process.platform !== 'win32';

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGABRT: 6,
  SIGKILL: 9,
  SIGSEGV: 11,
  SIGPIPE: 13,
  SIGTERM: 15,
};

/** shell convention: 128 + signal number */
function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
}

// after SIGKILL, how long a descendant that left the group may keep the pipes open
const FORCE_CLOSE_MS = 1000;

export class LocalProcessHandle implements ProcessHandle {
  private readonly output: AsyncQueue<ProcessOutput>;
  private readonly exited: Promise<number>;
  /** leader exited and every output pipe closed */
  private readonly settled: Promise<void>;
  private exitCode: number | null = null;

  constructor(
    private readonly child: ChildProcess,
    private readonly defaultGraceMs: number,
    private readonly logger: Logger,
  ) {
    const streams: Array<{ stream: Readable; channel: OutputChannel }> = [];
    if (child.stdout) streams.push({ stream: child.stdout, channel: 'stdout' });
    if (child.stderr) streams.push({ stream: child.stderr, channel: 'stderr' });
    this.output = readLines(streams);

    this.exited = new Promise<number>((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitCode = code ?? signalExitCode(signal);
        resolve(this.exitCode);
      });
    });
    const closed = streams.map(({ stream }) => new Promise<void>((resolve) => stream.once('close', () => resolve())));
    this.settled = Promise.all([this.exited, ...closed]).then(() => undefined);
    child.on('error', (err) => this.logger.warn(`pid ${child.pid}: ${err.message}`));
  }

  /** True until the process has exited and its output is fully read. */
  get running(): boolean {
    return this.exitCode === null || !this.output.closed;
  }

  lines(): AsyncIterable<ProcessOutput> {
    return this.output;
  }

  wait(): Promise<number> {
    return this.exited;
  }

  /**
   * Signals the whole process group, so background children still holding the
   * output pipes are stopped too, even when the leader has already exited.
   */
  async stop(gracePeriodMs = this.defaultGraceMs): Promise<void> {
    if (!this.running) return;

    this.signal('SIGTERM');
    if (await settlesWithin(this.settled, gracePeriodMs)) return;

    this.logger.warn(`pid ${this.child.pid} ignored SIGTERM for ${gracePeriodMs}ms, sending SIGKILL`);
    this.signal('SIGKILL');
    if (await settlesWithin(this.settled, FORCE_CLOSE_MS)) return;

    this.logger.warn(`output of pid ${this.child.pid} still open after SIGKILL, closing it`);
    this.output.end();
    this.child.stdout?.destroy();
    this.child.stderr?.destroy();
    await this.exited;
  }

  private signal(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (USE_PROCESS_GROUP && pid !== undefined) {
      try {
        process.kill(-pid, signal);
        return;
      } catch (err) {
        this.logger.debug(`group signal to ${pid} failed (${errorMessage(err)}), signalling the process`);
      }
    }
    this.child.kill(signal);
  }
}

/**
 * Runs steps as child processes of this service. Stdout and stderr are read
 * separately and merged into one line sequence.
 */
@Injectable()
export class LocalBackend implements ExecutionBackend {
  readonly kind = 'local' as const;
  private readonly logger = new Logger(LocalBackend.name);

  constructor(@Inject(RUNNER_CONFIG) private readonly config: Pick<RunnerConfig, 'local'>) {}

  buildArgv(command: Readonly<StepCommand>): string[] {
    const { envScript } = this.config.local;
    return envScript ? withEnvScript(command, envScript) : [command.program, ...command.args];
  }

  async start(
    command: Readonly<StepCommand>,
    workingDirectory: string,
    environment: Record<string, string>,
  ): Promise<ProcessHandle> {
    const [file, ...args] = this.buildArgv(command);

    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        cwd: workingDirectory,
        env: { ...process.env, ...environment },
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: USE_PROCESS_GROUP,
      });
    } catch (err) {
      throw this.toStartError(file, err);
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (err: Error) => {
        child.off('spawn', onSpawn);
        reject(this.toStartError(file, err));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    this.logger.debug(`started ${formatCommand(command)} as pid ${child.pid} in ${workingDirectory}`);
    return new LocalProcessHandle(child, this.config.local.stopGraceMs, this.logger);
  }

  private toStartError(file: string, err: unknown): Error {
    const code = errorCode(err);
    if (code && MISSING_COMMAND_CODES.has(code)) {
      return new CommandNotFoundError(file, code);
    }
    return new BackendUnavailableError(this.kind, errorMessage(err));
  }
}
