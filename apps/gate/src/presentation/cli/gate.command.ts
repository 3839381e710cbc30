import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { ExitCode, ReadinessState } from '@readiness-gate/shared';
import { WaitForDependenciesUseCase } from '@/application/use-cases/readiness/wait-for-dependencies.use-case';
import { runContext } from '@/shared/run-context';
import { summarize } from './readiness-summary';

@Injectable()
export class GateCommand {
  private readonly logger = new Logger(GateCommand.name);

  constructor(private readonly waitForDependencies: WaitForDependenciesUseCase) {}

  run(): Promise<ExitCode> {
    return runContext.run({ runId: randomUUID() }, async () => {
      const outcome = await this.waitForDependencies.execute();
      const summary = summarize(outcome);

      if (summary.state === ReadinessState.ALL_READY) {
        this.logger.log(`Readiness summary: ${JSON.stringify(summary)}`);
        return ExitCode.READY;
      }
      this.logger.error(`Readiness summary: ${JSON.stringify(summary)}`);
      return ExitCode.TIMED_OUT;
    });
  }
}
