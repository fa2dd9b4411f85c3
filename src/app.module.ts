import { Module } from '@nestjs/common';

import { RUNNER_CONFIG, RunnerConfig, loadRunnerConfig } from './config/runner.config';
import { RunsController } from './controllers/runs.controller';
import { ContainerBackend } from './services/backends/container.backend';
import { EXECUTION_BACKENDS, ExecutionBackends } from './services/backends/execution.backend';
import { LocalBackend } from './services/backends/local.backend';
import { dockerClientProvider } from './services/container.manager';
import { LogsGateway } from './services/logs.gateway';
import { OutputBroadcaster } from './services/output.broadcaster';
import { RunsService } from './services/runs.service';
import { STEP_TABLE, loadStepTable } from './services/step.table';

@Module({
  controllers: [RunsController],
  providers: [
    { provide: RUNNER_CONFIG, useFactory: (): RunnerConfig => loadRunnerConfig(process.env) },
    { provide: STEP_TABLE, useFactory: (config: RunnerConfig) => loadStepTable(config), inject: [RUNNER_CONFIG] },
    dockerClientProvider,
    LocalBackend,
    ContainerBackend,
    {
      provide: EXECUTION_BACKENDS,
      useFactory: (local: LocalBackend, container: ContainerBackend): ExecutionBackends => ({ local, container }),
      inject: [LocalBackend, ContainerBackend],
    },
    OutputBroadcaster,
    RunsService,
    LogsGateway,
  ],
})
export class AppModule {}
