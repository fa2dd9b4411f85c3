// src/services/backends/container.backend.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import * as path from 'path';

import { RUNNER_CONFIG, RunnerConfig } from '../../config/runner.config';
import { ContainerSession, DOCKER_CLIENT, DockerClient, describeDockerError } from '../container.manager';
import { AsyncQueue } from '../async.queue';
import { BackendUnavailableError, CommandNotFoundError, ExecutionBackendError } from '../runner.errors';
import { StepCommand, formatCommand } from '../runner.types';
import { ExecutionBackend, ProcessHandle, ProcessOutput, withEnvScript } from './execution.backend';
import { readLines } from './line.reader';

// how the runtime reports a Cmd it cannot exec
const MISSING_EXECUTABLE = /executable file not found|no such file or directory/i;

type ExitOutcome = { ok: true; code: number } | { ok: false; error: unknown };

/**
 * A step running in its own container. The container is removed exactly once,
 * whichever of wait() or stop() gets there first.
 */
export class ContainerProcessHandle implements ProcessHandle {
  private readonly exit: Promise<ExitOutcome>;
  private removal: Promise<void> | null = null;
  private exited = false;

  constructor(
    private readonly session: ContainerSession,
    private readonly output: AsyncQueue<ProcessOutput>,
    private readonly defaultGraceMs: number,
    private readonly logger: Logger,
  ) {
    this.exit = session.wait().then(
      (code): ExitOutcome => {
        this.exited = true;
        return { ok: true, code };
      },
      (error: unknown): ExitOutcome => {
        this.exited = true;
        return { ok: false, error };
      },
    );
  }

  get running(): boolean {
    return !this.exited && this.removal === null;
  }

  lines(): AsyncIterable<ProcessOutput> {
    return this.output;
  }

  async wait(): Promise<number> {
    const outcome = await this.exit;
    await this.dispose();
    if (!outcome.ok) {
      throw new ExecutionBackendError('container', describeDockerError(outcome.error));
    }
    return outcome.code;
  }

  /** Stops the container if it is still running, then removes it. */
  async stop(gracePeriodMs = this.defaultGraceMs): Promise<void> {
    if (this.removal) return this.removal;
    if (this.exited) return this.dispose();

    try {
      if (gracePeriodMs > 0) {
        await this.session.stop(Math.ceil(gracePeriodMs / 1000));
      } else {
        await this.session.kill();
      }
    } catch (err) {
      this.logger.warn(`stopping container ${this.session.id} failed: ${describeDockerError(err)}; removing it`);
    }
    await this.dispose();
  }

  /** Force-removes the container once; later calls share the first attempt. */
  dispose(): Promise<void> {
    if (!this.removal) {
      this.removal = this.session.remove().then(
        () => this.logger.debug(`removed container ${this.session.id}`),
        (err: unknown) => this.logger.error(`failed to remove container ${this.session.id}: ${describeDockerError(err)}`),
      );
    }
    return this.removal;
  }
}

/**
 * Runs each step in an ephemeral container with the run directory
 * bind-mounted read-write at the configured mount point.
 */
@Injectable()
export class ContainerBackend implements ExecutionBackend {
  readonly kind = 'container' as const;
  private readonly logger = new Logger(ContainerBackend.name);

  constructor(
    @Inject(RUNNER_CONFIG) private readonly config: Pick<RunnerConfig, 'container'>,
    @Inject(DOCKER_CLIENT) private readonly docker: DockerClient,
  ) {}

  buildCmd(command: Readonly<StepCommand>): string[] {
    const { envScript, mountPoint } = this.config.container;
    return envScript ? withEnvScript(command, envScript, mountPoint) : [command.program, ...command.args];
  }

  async start(
    command: Readonly<StepCommand>,
    workingDirectory: string,
    environment: Record<string, string>,
  ): Promise<ProcessHandle> {
    const opts = this.config.container;

    try {
      await this.docker.ping(opts.dockerTimeoutMs);
    } catch (err) {
      throw new BackendUnavailableError(this.kind, describeDockerError(err));
    }

    let imagePresent: boolean;
    try {
      imagePresent = await this.docker.hasImage(opts.image, opts.dockerTimeoutMs);
    } catch (err) {
      throw new BackendUnavailableError(this.kind, describeDockerError(err));
    }
    if (!imagePresent) {
      throw new CommandNotFoundError(opts.image, 'image not present');
    }

    let session: ContainerSession;
    try {
      session = await this.docker.createContainer({
        image: opts.image,
        cmd: this.buildCmd(command),
        workingDir: opts.mountPoint,
        env: { FOAM_USER_RUN: '/tmp', ...environment },
        binds: [`${path.resolve(workingDirectory)}:${opts.mountPoint}:rw`],
        memoryMb: opts.memoryMb,
        user: opts.user,
      });
    } catch (err) {
      throw new BackendUnavailableError(this.kind, describeDockerError(err));
    }

    try {
      // attach before start so no output is lost
      const streams = await session.attach();
      const output = readLines([
        { stream: streams.stdout, channel: 'stdout' },
        { stream: streams.stderr, channel: 'stderr' },
      ]);
      await session.start();
      this.logger.debug(`container ${session.id} running ${formatCommand(command)}`);
      return new ContainerProcessHandle(session, output, opts.stopGraceMs, this.logger);
    } catch (err) {
      await session.remove().catch((removeErr: unknown) =>
        this.logger.error(`failed to remove container ${session.id}: ${describeDockerError(removeErr)}`),
      );
      const detail = describeDockerError(err);
      if (MISSING_EXECUTABLE.test(detail)) {
        throw new CommandNotFoundError(command.program, detail);
      }
      throw new BackendUnavailableError(this.kind, detail);
    }
  }
}
