// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './app.module';
import { RUNNER_CONFIG, RunnerConfig } from './config/runner.config';
import { LogsGateway } from './services/logs.gateway';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
    // SSE and socket connections would otherwise hold up close()
    forceCloseConnections: true,
  });
  const config = app.get<RunnerConfig>(RUNNER_CONFIG);
  app.useLogger(config.logLevels);
  app.enableShutdownHooks();

  app.get(LogsGateway).attach(app.getHttpServer());

  await app.listen(config.port);
  Logger.log(`listening on :${config.port} (${config.backend} backend)`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.message : String(err), err instanceof Error ? err.stack : undefined, 'Bootstrap');
  process.exitCode = 1;
});
