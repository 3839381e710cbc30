import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { ExitCode } from '@readiness-gate/shared';
import { AppModule } from './app.module';
import { StructuredLogger, resolveLogLevel } from './infrastructure/logging/structured-logger';
import { ConfigError } from './core/domain/readiness/errors/config.error';
import { GateCommand } from './presentation/cli/gate.command';

function exitCodeFor(error: unknown): ExitCode {
  return error instanceof ConfigError ? ExitCode.MISCONFIGURED : ExitCode.UNEXPECTED;
}

/** Boots the application context, runs the gate once and closes the context. */
export async function runGate(): Promise<ExitCode> {
  let app: INestApplicationContext | undefined;
  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: new StructuredLogger(resolveLogLevel(process.env.LOG_LEVEL)),
      abortOnError: false,
    });
    return await app.get(GateCommand).run();
  } catch (error) {
    const code = exitCodeFor(error);
    Logger.error(
      code === ExitCode.MISCONFIGURED ? `Invalid configuration: ${String(error)}` : error,
      error instanceof Error ? error.stack : undefined,
      'Bootstrap',
    );
    return code;
  } finally {
    await app?.close();
  }
}
