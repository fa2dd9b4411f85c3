import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

import { FakeDocker } from '../../test/fake.docker';
import { ScriptedBackend, ScriptedStep } from '../../test/scripted.backend';
import { loadRunnerConfig } from '../config/runner.config';
import { ContainerBackend } from './backends/container.backend';
import { LocalBackend } from './backends/local.backend';
import { OutputBroadcaster } from './output.broadcaster';
import { AlreadyRunningError, CommandNotFoundError, InvalidWorkingDirectoryError } from './runner.errors';
import { EXIT_INFRASTRUCTURE_FAILURE, EXIT_STOPPED, StreamEvent } from './runner.types';
import { RunIdSequence, RunsService, timestampRunId } from './runs.service';
import { defineStepTable } from './step.table';

const config = loadRunnerConfig({ EXECUTION_BACKEND: 'local', LOCAL_STOP_GRACE_MS: '50' });

const simulationPipeline = defineStepTable([
  { name: 'mesh', command: { program: 'blockMesh' } },
  { name: 'check', command: { program: 'checkMesh' }, failurePolicy: 'ContinueOnFailure' },
  { name: 'solve', command: { program: 'simpleFoam' } },
]);

describe('RunsService', () => {
  let workDir: string;
  let broadcaster: OutputBroadcaster;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'runs-service-'));
    broadcaster = new OutputBroadcaster(config);
  });

  afterEach(async () => {
    await fs.remove(workDir);
  });

  function createService(script: Record<string, ScriptedStep>, steps = simulationPipeline) {
    const backend = new ScriptedBackend(script);
    const service = new RunsService(steps, { local: backend, container: backend }, broadcaster, config);
    return { backend, service };
  }

  function collect(): { events: StreamEvent[]; done: () => Promise<void> } {
    const sub = broadcaster.subscribe();
    const events: StreamEvent[] = [];
    const reading = (async () => {
      for await (const event of sub) events.push(event);
    })();
    return {
      events,
      done: async () => {
        broadcaster.unsubscribe(sub);
        await reading;
      },
    };
  }

  it('completes when every step exits 0', async () => {
    const { service, backend } = createService({});

    const { runId } = await service.start({ workingDirectory: workDir });
    const summary = await service.waitForRun();

    expect(summary?.runId).toBe(runId);
    expect(summary?.state).toBe('Completed');
    expect(summary?.exitCode).toBe(0);
    expect(summary?.steps).toEqual([
      { name: 'mesh', status: 'Completed', exitCode: 0 },
      { name: 'check', status: 'Completed', exitCode: 0 },
      { name: 'solve', status: 'Completed', exitCode: 0 },
    ]);
    expect(backend.started).toEqual(['blockMesh', 'checkMesh', 'simpleFoam']);
    expect(service.status().state).toBe('Completed');
    expect(service.status().activeStep).toBeUndefined();
  });

  it('keeps going past a failed continue-on-failure step and still completes', async () => {
    const { service, backend } = createService({ checkMesh: { exitCode: 1 } });

    await service.start({ workingDirectory: workDir });
    const summary = await service.waitForRun();

    expect(summary?.state).toBe('Completed');
    expect(summary?.exitCode).toBe(0);
    expect(summary?.steps.map((s) => [s.name, s.status, s.exitCode])).toEqual([
      ['mesh', 'Completed', 0],
      ['check', 'Failed', 1],
      ['solve', 'Completed', 0],
    ]);
    expect(backend.started).toEqual(['blockMesh', 'checkMesh', 'simpleFoam']);
  });

  it('fails and skips the rest when an abort step exits non-zero', async () => {
    const { service, backend } = createService({ blockMesh: { exitCode: 1 } });

    await service.start({ workingDirectory: workDir });
    const summary = await service.waitForRun();

    expect(summary?.state).toBe('Failed');
    expect(summary?.exitCode).toBe(1);
    expect(summary?.reason).toBe('Step mesh exited with code 1');
    expect(summary?.steps.map((s) => s.status)).toEqual(['Failed', 'Skipped', 'Skipped']);
    expect(backend.started).toEqual(['blockMesh']);
  });

  it('reports the first abort step exit code after an earlier diagnostic failure', async () => {
    const steps = defineStepTable([
      { name: 'a', command: { program: 'a' } },
      { name: 'b', command: { program: 'b' }, failurePolicy: 'ContinueOnFailure' },
      { name: 'c', command: { program: 'c' } },
      { name: 'd', command: { program: 'd' } },
    ]);
    const { service } = createService({ b: { exitCode: 2 }, c: { exitCode: 7 } }, steps);

    await service.start({ workingDirectory: workDir });
    const summary = await service.waitForRun();

    expect(summary?.state).toBe('Failed');
    expect(summary?.exitCode).toBe(7);
    expect(summary?.steps.map((s) => s.status)).toEqual(['Completed', 'Failed', 'Failed', 'Skipped']);
  });

  it('treats a step that cannot start as fatal whatever its policy', async () => {
    const { service, backend } = createService({ checkMesh: { startError: new CommandNotFoundError('checkMesh', 'ENOENT') } });

    await service.start({ workingDirectory: workDir });
    const summary = await service.waitForRun();

    expect(summary?.state).toBe('Failed');
    expect(summary?.exitCode).toBe(EXIT_INFRASTRUCTURE_FAILURE);
    expect(summary?.reason).toBe('check: Command not found: checkMesh (ENOENT)');
    expect(summary?.steps).toEqual([
      { name: 'mesh', status: 'Completed', exitCode: 0 },
      {
        name: 'check',
        status: 'Failed',
        exitCode: EXIT_INFRASTRUCTURE_FAILURE,
        reason: 'Command not found: checkMesh (ENOENT)',
      },
      { name: 'solve', status: 'Skipped' },
    ]);
    expect(backend.started).toEqual(['blockMesh']);
  });

  it('rejects a second start while running without touching the active run', async () => {
    const { service, backend } = createService({ simpleFoam: { hang: true } });

    const { runId } = await service.start({ workingDirectory: workDir });
    await backend.whenStarted('simpleFoam');
    const before = service.status();

    await expect(service.start({ workingDirectory: workDir })).rejects.toBeInstanceOf(AlreadyRunningError);
    await expect(service.start({ workingDirectory: '/does/not/exist' })).rejects.toBeInstanceOf(AlreadyRunningError);

    expect(service.status()).toEqual(before);
    expect(service.status().runId).toBe(runId);
    expect(service.status().activeStep).toBe('solve');

    await service.stop();
  });

  it('stops mid-solve and answers repeated stops with the same state', async () => {
    const steps = defineStepTable([
      ...simulationPipeline,
      { name: 'post', command: { program: 'foamToVTK' } },
    ]);
    const { service, backend } = createService({ simpleFoam: { hang: true, lines: ['Time = 1'] } }, steps);

    await service.start({ workingDirectory: workDir });
    const solve = await backend.whenStarted('simpleFoam');

    const first = await service.stop();
    const second = await service.stop();

    expect(first).toEqual({ accepted: true, state: 'Stopped' });
    expect(second).toEqual({ accepted: true, state: 'Stopped' });
    expect(solve.running).toBe(false);
    expect(solve.stopCalls).toBe(1);
    expect(backend.started).toEqual(['blockMesh', 'checkMesh', 'simpleFoam']);

    const status = service.status();
    expect(status.state).toBe('Stopped');
    expect(status.exitCode).toBe(EXIT_STOPPED);
    expect(status.reason).toBe('stopped during solve');
    expect(status.steps.map((s) => [s.name, s.status])).toEqual([
      ['mesh', 'Completed'],
      ['check', 'Completed'],
      ['solve', 'Failed'],
      ['post', 'Skipped'],
    ]);
    expect(status.steps[2]).toEqual({ name: 'solve', status: 'Failed', exitCode: 143, reason: 'stopped' });
  });

  it('returns Idle from stop when nothing has run', async () => {
    const { service } = createService({});
    await expect(service.stop()).resolves.toEqual({ accepted: false, state: 'Idle' });
    expect(service.status().state).toBe('Idle');
  });

  it('answers stop after a completed run with the terminal state', async () => {
    const { service } = createService({});
    await service.start({ workingDirectory: workDir });
    await service.waitForRun();

    await expect(service.stop()).resolves.toEqual({ accepted: false, state: 'Completed' });
  });

  it('accepts a new run once the previous one is terminal', async () => {
    const { service, backend } = createService({});

    await service.start({ workingDirectory: workDir });
    const first = await service.waitForRun();
    const { runId } = await service.start({ workingDirectory: workDir });
    const second = await service.waitForRun();

    expect(second?.runId).toBe(runId);
    expect(second?.runId).not.toBe(first?.runId);
    expect(backend.started).toHaveLength(6);
  });

  it('passes the run id to every step', async () => {
    const { service, backend } = createService({});
    const { runId } = await service.start({ workingDirectory: workDir });
    await service.waitForRun();

    expect(backend.environments).toEqual([{ SIM_RUN_ID: runId }, { SIM_RUN_ID: runId }, { SIM_RUN_ID: runId }]);
  });

  it('rejects a working directory that does not exist', async () => {
    const { service } = createService({});
    await expect(service.start({ workingDirectory: path.join(workDir, 'missing') })).rejects.toBeInstanceOf(
      InvalidWorkingDirectoryError,
    );
    expect(service.status().state).toBe('Idle');
  });

  it('publishes lifecycle events and output in order', async () => {
    const { service } = createService({ blockMesh: { lines: ['cells: 400'] }, checkMesh: { exitCode: 1 } });
    const stream = collect();

    const { runId } = await service.start({ workingDirectory: workDir });
    await service.waitForRun();
    await stream.done();

    expect(stream.events.map((e) => e.type)).toEqual([
      'run-started',
      'step-started',
      'output',
      'step-finished',
      'step-started',
      'step-finished',
      'step-started',
      'step-finished',
      'run-finished',
    ]);
    expect(stream.events[2]).toEqual({
      type: 'output',
      line: { runId, stepName: 'mesh', timestampMonotonic: 0, text: 'cells: 400', channel: 'stdout' },
    });
    expect(stream.events[5]).toEqual({
      type: 'step-finished',
      runId,
      stepName: 'check',
      status: 'Failed',
      exitCode: 1,
      reason: 'exited with code 1 (continue on failure)',
    });
  });

  it('writes every line to the log in the order subscribers saw it, with one trailer', async () => {
    const { service } = createService({
      blockMesh: { lines: ['alpha', 'beta'] },
      checkMesh: { lines: [{ text: 'warning', channel: 'stderr' }] },
      simpleFoam: { lines: ['gamma'] },
    });
    const stream = collect();

    const { runId, logFile } = await service.start({ workingDirectory: workDir });
    await service.waitForRun();
    await stream.done();

    expect(logFile).toBe(path.join(path.resolve(workDir), 'simulation.log'));
    const lines = (await fs.readFile(logFile, 'utf8')).trimEnd().split('\n');

    expect(lines[0]).toMatch(new RegExp(`^Run ${runId} started at \\d{4}-`));
    expect(lines[1]).toBe(`Working directory: ${path.resolve(workDir)}`);
    expect(lines[2]).toBe('Backend: local');

    const seen = stream.events.flatMap((e) => (e.type === 'output' ? [`[${e.line.stepName}] ${e.line.text}`] : []));
    expect(seen).toEqual(['[mesh] alpha', '[mesh] beta', '[check] warning', '[solve] gamma']);
    expect(lines.filter((line) => /^\[(mesh|check|solve)\] /.test(line))).toEqual(seen);

    expect(lines.filter((line) => line.startsWith('Final state:'))).toEqual(['Final state: Completed']);
    expect(lines.slice(-4)).toEqual(['Steps:', '  mesh: Completed (exit 0)', '  check: Completed (exit 0)', '  solve: Completed (exit 0)']);
  });

  it('writes the trailer when the run is stopped', async () => {
    const { service, backend } = createService({ simpleFoam: { hang: true } });
    const { logFile } = await service.start({ workingDirectory: workDir });
    await backend.whenStarted('simpleFoam');
    await service.stop();

    const lines = (await fs.readFile(logFile, 'utf8')).trimEnd().split('\n');
    expect(lines).toContain('==> [solve] Failed (exit 143): stopped');
    expect(lines).toContain('Final state: Stopped');
    expect(lines).toContain(`Exit code: ${EXIT_STOPPED}`);
    expect(lines).toContain('Reason: stopped during solve');
    expect(lines[lines.length - 1]).toBe('  solve: Failed (exit 143)');
  });

  it('stops promptly when a step leaves a background child holding its output', async () => {
    const local = new LocalBackend(config);
    const steps = defineStepTable([{ name: 'solve', command: { program: 'sh', args: ['-c', 'sleep 30 & echo started'] } }]);
    const service = new RunsService(steps, { local, container: local }, broadcaster, config);
    const sub = broadcaster.subscribe();

    await service.start({ workingDirectory: workDir });
    for await (const event of sub) {
      if (event.type === 'output') break;
    }

    const stopping = Date.now();
    await expect(service.stop()).resolves.toEqual({ accepted: true, state: 'Stopped' });
    expect(Date.now() - stopping).toBeLessThan(5000);
    expect(service.status().exitCode).toBe(EXIT_STOPPED);
  });

  it('removes the container when the run fails while draining its output', async () => {
    class FailingBroadcaster extends OutputBroadcaster {
      publish(event: StreamEvent): void {
        if (event.type === 'output') throw new Error('disk full');
        super.publish(event);
      }
    }
    const docker = new FakeDocker();
    docker.session.runOnStart = { lines: ['Time = 1', 'Time = 2'], exitCode: 0 };
    const containers = new ContainerBackend(config, docker);
    const steps = defineStepTable([{ name: 'solve', command: { program: 'simpleFoam' } }]);
    const service = new RunsService(steps, { local: containers, container: containers }, new FailingBroadcaster(config), config);

    await service.start({ workingDirectory: workDir, backend: 'container' });
    const summary = await service.waitForRun();

    expect(summary?.state).toBe('Failed');
    expect(summary?.exitCode).toBe(EXIT_INFRASTRUCTURE_FAILURE);
    expect(summary?.reason).toBe('solve: disk full');
    expect(docker.session.calls.filter((call) => call === 'remove')).toHaveLength(1);
  });
});

describe('RunIdSequence', () => {
  it('suffixes ids issued within the same second and restarts on the next', () => {
    const ids = new RunIdSequence();
    const second = new Date(2024, 0, 5, 7, 8, 9);

    expect(ids.next(second)).toBe('run_20240105_070809');
    expect(ids.next(second)).toBe('run_20240105_070809_2');
    expect(ids.next(second)).toBe('run_20240105_070809_3');
    expect(ids.next(new Date(2024, 0, 5, 7, 8, 10))).toBe('run_20240105_070810');
  });
});

describe('timestampRunId', () => {
  it('formats the local creation time', () => {
    expect(timestampRunId(new Date(2024, 0, 5, 7, 8, 9))).toBe('run_20240105_070809');
  });
});
