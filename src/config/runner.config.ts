// src/config/runner.config.ts
import { LogLevel } from '@nestjs/common';
import { z } from 'zod';

export const RUNNER_CONFIG = Symbol('RUNNER_CONFIG');

const DEFAULT_CONTAINER_ENV_SCRIPT = '/usr/lib/openfoam/openfoam2412/etc/bashrc';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUndefined, z.string().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().nonnegative().default(fallback));

const envSchema = z.object({
  PORT: positiveInt(5000),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log')),
  EXECUTION_BACKEND: z.preprocess(emptyAsUndefined, z.enum(['local', 'container']).default('container')),
  SOLVER: z.preprocess(emptyAsUndefined, z.string().min(1).default('simpleFoam')),
  PIPELINE_FILE: optionalString,
  FOAM_ENV_SCRIPT: optionalString,
  CONTAINER_IMAGE: z.preprocess(emptyAsUndefined, z.string().min(1).default('opencfd/openfoam-default:2412')),
  CONTAINER_MOUNT_POINT: z.preprocess(
    emptyAsUndefined,
    z.string().startsWith('/', 'must be an absolute container path').default('/case'),
  ),
  CONTAINER_MEMORY_MB: positiveInt(4096),
  CONTAINER_USER: optionalString,
  DOCKER_SOCKET: z.preprocess(emptyAsUndefined, z.string().min(1).default('/var/run/docker.sock')),
  DOCKER_TIMEOUT_MS: positiveInt(5000),
  LOCAL_STOP_GRACE_MS: nonNegativeInt(5000),
  CONTAINER_STOP_GRACE_MS: nonNegativeInt(0),
  SUBSCRIBER_BUFFER: positiveInt(1000),
  LOG_FILE_NAME: z.preprocess(
    emptyAsUndefined,
    z
      .string()
      .regex(/^[^/\\]+$/, 'must be a bare file name')
      .default('simulation.log'),
  ),
});

export interface RunnerConfig {
  port: number;
  logLevels: LogLevel[];
  backend: 'local' | 'container';
  solver: string;
  pipelineFile?: string;
  logFileName: string;
  subscriberBuffer: number;
  local: {
    envScript?: string;
    stopGraceMs: number;
  };
  container: {
    image: string;
    mountPoint: string;
    memoryMb: number;
    user?: string;
    envScript?: string;
    stopGraceMs: number;
    dockerSocket: string;
    dockerTimeoutMs: number;
  };
}

export class RunnerConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid runner configuration: ${issues.join('; ')}`);
    this.name = 'RunnerConfigError';
  }
}

function hostUser(): string | undefined {
  if (!process.getuid || !process.getgid) return undefined;
  return `${process.getuid()}:${process.getgid()}`;
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new RunnerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    // Nest enables exactly the levels it is given, so include everything up to the threshold
    logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(e.LOG_LEVEL) + 1),
    backend: e.EXECUTION_BACKEND,
    solver: e.SOLVER,
    pipelineFile: e.PIPELINE_FILE,
    logFileName: e.LOG_FILE_NAME,
    subscriberBuffer: e.SUBSCRIBER_BUFFER,
    local: {
      envScript: e.FOAM_ENV_SCRIPT,
      stopGraceMs: e.LOCAL_STOP_GRACE_MS,
    },
    container: {
      image: e.CONTAINER_IMAGE,
      mountPoint: e.CONTAINER_MOUNT_POINT,
      memoryMb: e.CONTAINER_MEMORY_MB,
      user: e.CONTAINER_USER ?? hostUser(),
      envScript: e.FOAM_ENV_SCRIPT ?? DEFAULT_CONTAINER_ENV_SCRIPT,
      stopGraceMs: e.CONTAINER_STOP_GRACE_MS,
      dockerSocket: e.DOCKER_SOCKET,
      dockerTimeoutMs: e.DOCKER_TIMEOUT_MS,
    },
  };
}
