// src/services/backends/execution.backend.ts
import { BackendKind, OutputChannel, StepCommand } from '../runner.types';

export const EXECUTION_BACKENDS = Symbol('EXECUTION_BACKENDS');

export interface ProcessOutput {
  channel: OutputChannel;
  text: string;
  timestampMonotonic: number;
}

/**
 * A started step process.
 *
 * lines() yields stdout and stderr as one sequence. Order is preserved within
 * each channel but not between them. The sequence ends when the process closes
 * its output; calling lines() again returns the same, partly consumed sequence.
 *
 * wait() resolves the exit code, non-zero included, and rejects only when the
 * backend itself fails.
 */
export interface ProcessHandle {
  /** False once the process has exited and its resources are released. */
  readonly running: boolean;
  lines(): AsyncIterable<ProcessOutput>;
  wait(): Promise<number>;
  /**
   * Asks the process to terminate, forcing it after gracePeriodMs, and
   * releases whatever the backend holds for it. Safe to call at any time.
   */
  stop(gracePeriodMs?: number): Promise<void>;
}

export interface ExecutionBackend {
  readonly kind: BackendKind;
  /**
   * Throws BackendUnavailableError when the substrate cannot be reached and
   * CommandNotFoundError when the program or image is missing.
   */
  start(
    command: Readonly<StepCommand>,
    workingDirectory: string,
    environment: Record<string, string>,
  ): Promise<ProcessHandle>;
}

export type ExecutionBackends = Record<BackendKind, ExecutionBackend>;

/** Single-quotes an argument for bash. */
export function shellQuote(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** argv that loads an environment script before exec'ing the command */
export function withEnvScript(command: Readonly<StepCommand>, envScript: string, cwd?: string): string[] {
  const exec = ['exec', ...[command.program, ...command.args].map(shellQuote)].join(' ');
  const cd = cwd ? `cd ${shellQuote(cwd)} && ` : '';
  return ['bash', '-c', `source ${shellQuote(envScript)} && ${cd}${exec}`];
}
