// src/services/run.log.ts
import * as fs from 'fs-extra';

import { RunLogError, errorMessage } from './runner.errors';
import { BackendKind, RunSummary, StreamEvent } from './runner.types';

const RULE = '='.repeat(80);

export interface RunLogHeader {
  runId: string;
  workingDirectory: string;
  backend: BackendKind;
  startedAt: Date;
}

/** Receives every published event synchronously, in publish order. */
export interface OutputSink {
  write(event: StreamEvent): void;
}

/**
 * Append-only log of one run. Writes are synchronous so the file always holds
 * everything published so far; the trailer is written exactly once.
 */
export class RunLog implements OutputSink {
  private fd: number | null;

  private constructor(readonly file: string, fd: number) {
    this.fd = fd;
  }

  static open(file: string, header: RunLogHeader): RunLog {
    let fd: number;
    try {
      fd = fs.openSync(file, 'a');
    } catch (err) {
      throw new RunLogError(file, errorMessage(err));
    }

    const log = new RunLog(file, fd);
    log.append([
      `Run ${header.runId} started at ${header.startedAt.toISOString()}`,
      `Working directory: ${header.workingDirectory}`,
      `Backend: ${header.backend}`,
      RULE,
    ]);
    return log;
  }

  get closed(): boolean {
    return this.fd === null;
  }

  write(event: StreamEvent): void {
    switch (event.type) {
      case 'output': {
        const prefix = event.line.stepName ? `[${event.line.stepName}] ` : '';
        this.append([`${prefix}${event.line.text}`]);
        break;
      }
      case 'step-started':
        this.append([`==> [${event.stepName}] started: ${event.command}`]);
        break;
      case 'step-finished': {
        const exit = event.exitCode === undefined ? '' : ` (exit ${event.exitCode})`;
        const reason = event.reason ? `: ${event.reason}` : '';
        this.append([`==> [${event.stepName}] ${event.status}${exit}${reason}`]);
        break;
      }
      case 'run-finished':
        this.close(event.summary);
        break;
      case 'run-started':
        // covered by the header
        break;
    }
  }

  /** Writes the trailer and closes the file. Later calls are no-ops. */
  close(summary: RunSummary): void {
    const fd = this.fd;
    if (fd === null) return;

    const lines = [
      RULE,
      `Run ended at ${summary.endedAt.toISOString()}`,
      `Duration: ${(summary.durationMs / 1000).toFixed(2)} seconds`,
      `Final state: ${summary.state}`,
      `Exit code: ${summary.exitCode}`,
    ];
    if (summary.reason) lines.push(`Reason: ${summary.reason}`);
    lines.push('Steps:');
    for (const step of summary.steps) {
      lines.push(
        step.exitCode === undefined
          ? `  ${step.name}: ${step.status}`
          : `  ${step.name}: ${step.status} (exit ${step.exitCode})`,
      );
    }

    try {
      this.append(lines);
    } finally {
      this.fd = null;
      fs.closeSync(fd);
    }
  }

  private append(lines: string[]): void {
    if (this.fd === null) {
      throw new RunLogError(this.file, 'log is already closed');
    }
    try {
      fs.writeSync(this.fd, lines.map((line) => `${line}\n`).join(''), null, 'utf8');
    } catch (err) {
      throw new RunLogError(this.file, errorMessage(err));
    }
  }
}
