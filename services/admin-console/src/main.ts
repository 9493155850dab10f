#!/usr/bin/env node
import 'reflect-metadata';
import { Logger as NestLogger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { sanitizeError } from '@spo-admin/utils';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { ConsoleCommandRunner, ExitCode } from './cli/console-command.runner';

// The HTTP adapter is initialized for the logger middleware but never listens.
async function bootstrap(): Promise<ExitCode> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const logger = app.get(Logger);
  app.useLogger(logger);
  await app.init();

  try {
    return await app.get(ConsoleCommandRunner).run(process.argv.slice(2));
  } finally {
    await app.close();
  }
}

bootstrap().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    new NestLogger('Bootstrap').error({ msg: 'Fatal error', error: sanitizeError(error) });
    process.exitCode = ExitCode.Failure;
  },
);
