// src/filters/runner-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';

import {
  AlreadyRunningError,
  BackendUnavailableError,
  CommandNotFoundError,
  InvalidWorkingDirectoryError,
  RunnerError,
} from '../services/runner.errors';

export interface RunnerErrorBody {
  statusCode: number;
  error: string;
  message: string;
  runId?: string;
}

export function toErrorResponse(err: RunnerError): RunnerErrorBody {
  let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
  if (err instanceof AlreadyRunningError) statusCode = HttpStatus.CONFLICT;
  else if (err instanceof InvalidWorkingDirectoryError) statusCode = HttpStatus.BAD_REQUEST;
  else if (err instanceof BackendUnavailableError || err instanceof CommandNotFoundError) {
    statusCode = HttpStatus.SERVICE_UNAVAILABLE;
  }

  const body: RunnerErrorBody = { statusCode, error: err.code, message: err.message };
  if (err instanceof AlreadyRunningError) body.runId = err.runId;
  return body;
}

/** Maps runner errors to JSON bodies; stack traces stay in the service log. */
@Catch(RunnerError)
export class RunnerExceptionFilter implements ExceptionFilter<RunnerError> {
  private readonly logger = new Logger(RunnerExceptionFilter.name);

  catch(exception: RunnerError, host: ArgumentsHost): void {
    const body = toErrorResponse(exception);
    if (body.statusCode >= 500) {
      this.logger.error(exception.message, exception.stack);
    }
    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
  }
}
