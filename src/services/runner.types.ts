// src/services/runner.types.ts
export type RunState = 'Idle' | 'Running' | 'Completed' | 'Failed' | 'Stopped';

export type StepStatus = 'Pending' | 'Running' | 'Completed' | 'Failed' | 'Skipped';

export type FailurePolicy = 'Abort' | 'ContinueOnFailure';

export type BackendKind = 'local' | 'container';

export type OutputChannel = 'stdout' | 'stderr';

/** Exit code reported when a backend could not start or keep running a step. */
export const EXIT_INFRASTRUCTURE_FAILURE = -1;

/** Exit code reported when the run ended because of stop(). */
export const EXIT_STOPPED = -2;

export const STOPPED_REASON = 'stopped';

export interface StepCommand {
  program: string;
  args: string[];
}

export interface StepDefinition {
  readonly name: string;
  readonly command: Readonly<StepCommand>;
  readonly failurePolicy: FailurePolicy;
}

export interface StepResult {
  name: string;
  status: StepStatus;
  exitCode?: number;
  reason?: string;
  startedAt?: Date;
  endedAt?: Date;
}

export interface OutputLine {
  runId: string;
  stepName?: string;
  /** performance.now() at the moment the line was read. */
  timestampMonotonic: number;
  text: string;
  channel: OutputChannel;
}

export interface StepSummary {
  name: string;
  status: StepStatus;
  exitCode?: number;
  reason?: string;
}

export interface RunSummary {
  runId: string;
  state: RunState;
  workingDirectory: string;
  backend: BackendKind;
  logFile: string;
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  exitCode: number;
  reason?: string;
  steps: StepSummary[];
}

export type StreamEvent =
  | {
      type: 'run-started';
      runId: string;
      workingDirectory: string;
      backend: BackendKind;
      startedAt: Date;
    }
  | { type: 'step-started'; runId: string; stepName: string; command: string }
  | { type: 'output'; line: OutputLine }
  | {
      type: 'step-finished';
      runId: string;
      stepName: string;
      status: StepStatus;
      exitCode?: number;
      reason?: string;
    }
  | { type: 'run-finished'; summary: RunSummary };

export interface RunStatusView {
  state: RunState;
  runId?: string;
  activeStep?: string;
  workingDirectory?: string;
  startedAt?: Date;
  endedAt?: Date;
  exitCode?: number;
  reason?: string;
  steps: StepSummary[];
}

export interface StopOutcome {
  accepted: boolean;
  state: RunState;
}

export function formatCommand(command: Readonly<StepCommand>): string {
  return [command.program, ...command.args].join(' ');
}

export function isTerminalRunState(state: RunState): boolean {
  return state === 'Completed' || state === 'Failed' || state === 'Stopped';
}
