#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';

import { CliInvocation, parseCli } from './cli';
import { Status } from './modules/checker/check-result';
import { CheckerService } from './modules/checker/checker.service';
import { AppModule } from './modules/app/app.module';
import { CheckerLogger } from './modules/logging/checker-logger.service';
import { LogCategory } from './modules/logging/log-levels';
import { ConfigurationError } from './modules/scim/common/scim-errors';
import { formatResult, formatSummary } from './modules/report/report-printer';

const EXIT_CHECK_FAILED = 1;
const EXIT_CONFIGURATION = 2;

/** Reports failures that happen before (or outside) the application context. */
const bootLogger = new CheckerLogger();

async function bootstrap(): Promise<number> {
  let invocation: CliInvocation;
  try {
    invocation = parseCli(process.argv);
  } catch (err) {
    // commander has already printed usage or help
    if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : EXIT_CONFIGURATION;
    throw err;
  }
  if (invocation.logLevel !== undefined) {
    bootLogger.setGlobalLevel(invocation.logLevel);
  }

  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule.forRoot(invocation.overrides), {
      logger: false,
      abortOnError: false,
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      bootLogger.error(LogCategory.CONFIG, err.message);
      return EXIT_CONFIGURATION;
    }
    throw err;
  }

  try {
    const logger = app.get(CheckerLogger);
    if (invocation.logLevel !== undefined) {
      logger.setGlobalLevel(invocation.logLevel);
    }
    logger.debug(LogCategory.CONFIG, 'Configuration loaded', { ...invocation.overrides });

    const { verbose } = invocation;
    const report = await app.get(CheckerService).run((result) => {
      process.stdout.write(`${formatResult(result, { verbose })}\n`);
    });
    process.stdout.write(`\n${formatSummary(report)}\n`);

    return report.some((result) => result.status === Status.ERROR) ? EXIT_CHECK_FAILED : 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    bootLogger.fatal(LogCategory.GENERAL, 'Check run aborted', err);
    process.exitCode = EXIT_CHECK_FAILED;
  });
