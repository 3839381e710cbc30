import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ExitCode } from '@readiness-gate/shared';
import { runGate } from './bootstrap';

// Exit explicitly: a client socket abandoned after a timeout must not hold the process open.
runGate().then(
  (code) => process.exit(code),
  (error: unknown) => {
    Logger.error(error, undefined, 'Bootstrap');
    process.exit(ExitCode.UNEXPECTED);
  },
);
