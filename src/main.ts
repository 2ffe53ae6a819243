#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { RunSyncUseCase } from './application/sync/run-sync.use-case';
import { SyncAgentConfigService } from './infrastructure/config/sync-agent-config.service';
import { runSyncOnce } from './presentation/cli/run-sync-once';

const SERVICE_NAME = 'sync-agent';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const config = app.get(SyncAgentConfigService);
  const logger = new Logger('Bootstrap');

  if (config.runIntervalMs > 0) {
    app.enableShutdownHooks();
    logger.log(`${SERVICE_NAME} watching ${config.sourceDir} every ${config.runIntervalMs}ms`);
    return;
  }

  try {
    process.exitCode = await runSyncOnce(app.get(RunSyncUseCase));
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(`Failed to start ${SERVICE_NAME}`, error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
