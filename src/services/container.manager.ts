// src/services/container.manager.ts
import { Logger } from '@nestjs/common';
import Dockerode = require('dockerode');
import { PassThrough, Readable } from 'stream';

import { RUNNER_CONFIG, RunnerConfig } from '../config/runner.config';
import { errorMessage } from './runner.errors';
import { withTimeout } from './timeouts';

export interface ContainerSpec {
  image: string;
  cmd: string[];
  workingDir: string;
  env: Record<string, string>;
  binds: string[];
  memoryMb?: number;
  user?: string;
}

export interface AttachedStreams {
  stdout: Readable;
  stderr: Readable;
}

/** One created container. */
export interface ContainerSession {
  readonly id: string;
  attach(): Promise<AttachedStreams>;
  start(): Promise<void>;
  /** Resolves the container's exit status. */
  wait(): Promise<number>;
  kill(): Promise<void>;
  stop(graceSeconds: number): Promise<void>;
  remove(): Promise<void>;
}

/** The slice of the Docker API the container backend relies on. */
export interface DockerClient {
  ping(timeoutMs: number): Promise<void>;
  hasImage(image: string, timeoutMs: number): Promise<boolean>;
  createContainer(spec: ContainerSpec): Promise<ContainerSession>;
}

export const DOCKER_CLIENT = Symbol('DOCKER_CLIENT');

interface DemuxModem {
  demuxStream(stream: NodeJS.ReadableStream, stdout: NodeJS.WritableStream, stderr: NodeJS.WritableStream): void;
}

function statusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

class DockerodeSession implements ContainerSession {
  constructor(private readonly container: Dockerode.Container, private readonly modem: DemuxModem) {}

  get id(): string {
    return this.container.id;
  }

  async attach(): Promise<AttachedStreams> {
    const stream = await this.container.attach({ stream: true, stdout: true, stderr: true });
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    this.modem.demuxStream(stream, stdout, stderr);

    const finish = () => {
      stdout.end();
      stderr.end();
    };
    stream.on('end', finish);
    stream.on('close', finish);
    stream.on('error', (err: Error) => {
      stdout.destroy(err);
      stderr.destroy(err);
    });
    return { stdout, stderr };
  }

  async start(): Promise<void> {
    await this.container.start();
  }

  async wait(): Promise<number> {
    const result: { StatusCode: number } = await this.container.wait();
    return result.StatusCode;
  }

  async kill(): Promise<void> {
    try {
      await this.container.kill();
    } catch (err) {
      // 409: not running any more
      if (statusCode(err) !== 409) throw err;
    }
  }

  async stop(graceSeconds: number): Promise<void> {
    try {
      await this.container.stop({ t: graceSeconds });
    } catch (err) {
      // 304: already stopped
      if (statusCode(err) !== 304) throw err;
    }
  }

  async remove(): Promise<void> {
    try {
      await this.container.remove({ force: true });
    } catch (err) {
      // 404: already gone
      if (statusCode(err) !== 404) throw err;
    }
  }
}

/** Dockerode-backed DockerClient. */
export class ContainerManager implements DockerClient {
  private readonly logger = new Logger(ContainerManager.name);

  constructor(private readonly docker: Dockerode) {}

  async ping(timeoutMs: number): Promise<void> {
    await withTimeout(
      this.docker.ping(),
      timeoutMs,
      () => new Error(`docker daemon did not answer within ${timeoutMs}ms`),
    );
  }

  async hasImage(image: string, timeoutMs: number): Promise<boolean> {
    try {
      await withTimeout(
        this.docker.getImage(image).inspect(),
        timeoutMs,
        () => new Error(`image inspect timed out after ${timeoutMs}ms`),
      );
      return true;
    } catch (err) {
      if (statusCode(err) === 404) return false;
      throw err;
    }
  }

  async createContainer(spec: ContainerSpec): Promise<ContainerSession> {
    const memory = spec.memoryMb ? spec.memoryMb * 1024 * 1024 : undefined;
    const container = await this.docker.createContainer({
      Image: spec.image,
      Cmd: spec.cmd,
      WorkingDir: spec.workingDir,
      Env: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
      User: spec.user,
      Tty: false,
      AttachStdout: true,
      AttachStderr: true,
      HostConfig: {
        Binds: spec.binds,
        AutoRemove: false,
        Memory: memory,
        MemorySwap: memory,
      },
    });
    this.logger.debug(`created container ${container.id} from ${spec.image}`);

    const modem: DemuxModem = this.docker.modem;
    return new DockerodeSession(container, modem);
  }
}

export function createDockerClient(config: Pick<RunnerConfig, 'container'>): DockerClient {
  return new ContainerManager(new Dockerode({ socketPath: config.container.dockerSocket }));
}

export const dockerClientProvider = {
  provide: DOCKER_CLIENT,
  useFactory: (config: RunnerConfig): DockerClient => createDockerClient(config),
  inject: [RUNNER_CONFIG],
};

export function describeDockerError(err: unknown): string {
  const code = statusCode(err);
  return code ? `${errorMessage(err)} (HTTP ${code})` : errorMessage(err);
}
