#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { HarnessExitCode, HarnessRunnerService } from './harness/harness-runner.service';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

const SIGNAL_EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Bootstrap the harness
 * Application context only (no HTTP); runs one integration test and exits
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const logger = await app.resolve(PinoLoggerService);
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    if (!closing) {
      // Closing the context runs onModuleDestroy, which tears down every started service
      closing = app.close();
    }
    return closing;
  };

  const abort = (exitCode: number): void => {
    process.exitCode = exitCode;
    close().then(
      () => process.exit(exitCode),
      (error: unknown) => {
        logger.error({ error: String(error) }, 'Teardown failed');
        process.exit(exitCode);
      },
    );
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.warn({ signal }, 'Received shutdown signal, tearing down services');
      abort(SIGNAL_EXIT_CODES[signal]);
    });
  }

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    abort(HarnessExitCode.ERROR);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason: String(reason) }, 'Unhandled rejection');
    abort(HarnessExitCode.ERROR);
  });

  logger.info({ pid: process.pid }, 'Integration harness started');

  const runner = app.get(HarnessRunnerService);
  try {
    process.exitCode = await runner.run();
  } finally {
    await close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Integration harness failed:', error);
  process.exitCode = HarnessExitCode.ERROR;
});
