// src/services/runner.errors.ts

export abstract class RunnerError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A run is already in progress; the request is rejected, never queued. */
export class AlreadyRunningError extends RunnerError {
  readonly code = 'ALREADY_RUNNING';

  constructor(readonly runId: string) {
    super(`Run ${runId} is already running`);
  }
}

export class InvalidWorkingDirectoryError extends RunnerError {
  readonly code = 'INVALID_WORKING_DIRECTORY';

  constructor(readonly workingDirectory: string, detail: string) {
    super(`Working directory ${workingDirectory} is not usable: ${detail}`);
  }
}

export class BackendUnavailableError extends RunnerError {
  readonly code = 'BACKEND_UNAVAILABLE';

  constructor(readonly backend: string, detail: string) {
    super(`${backend} backend unavailable: ${detail}`);
  }
}

export class CommandNotFoundError extends RunnerError {
  readonly code = 'COMMAND_NOT_FOUND';

  constructor(readonly target: string, detail?: string) {
    super(detail ? `Command not found: ${target} (${detail})` : `Command not found: ${target}`);
  }
}

/** The substrate failed after the process started (daemon gone, wait failed). */
export class ExecutionBackendError extends RunnerError {
  readonly code = 'EXECUTION_BACKEND_FAILURE';

  constructor(readonly backend: string, detail: string) {
    super(`${backend} backend failed: ${detail}`);
  }
}

/**
 * Non-zero exit of an Abort-policy step. This is an expected outcome, so it
 * is recorded on the run summary instead of being thrown.
 */
export class StepExecutionError extends RunnerError {
  readonly code = 'STEP_FAILED';

  constructor(readonly stepName: string, readonly exitCode: number) {
    super(`Step ${stepName} exited with code ${exitCode}`);
  }
}

export class SubscriberOverflowError extends RunnerError {
  readonly code = 'SUBSCRIBER_OVERFLOW';

  constructor(readonly subscriberId: number, readonly capacity: number) {
    super(`Subscriber ${subscriberId} fell more than ${capacity} events behind and was dropped`);
  }
}

export class RunLogError extends RunnerError {
  readonly code = 'RUN_LOG_FAILURE';

  constructor(readonly logFile: string, detail: string) {
    super(`Run log ${logFile} failed: ${detail}`);
  }
}

/** Infrastructure failures are always fatal to the run, whatever the step policy. */
export function isInfrastructureError(
  err: unknown,
): err is BackendUnavailableError | CommandNotFoundError | ExecutionBackendError {
  return (
    err instanceof BackendUnavailableError ||
    err instanceof CommandNotFoundError ||
    err instanceof ExecutionBackendError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** errno-style code of a system error, if any */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
