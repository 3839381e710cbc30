import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CheckResult,
  ReadinessState,
  TerminalReadinessState,
  WaitOutcome,
} from '@readiness-gate/shared';
import { CLOCK, Clock } from '@/application/ports/clock.port';
import { GATE_SETTINGS, GateSettings } from '@/application/settings/gate-settings';
import { CheckPlan } from '@/core/domain/readiness/entities/check-plan.entity';
import { WaitLoopStateMachine } from '@/core/domain/readiness/services/wait-loop-state-machine.service';
import { runContext } from '@/shared/run-context';
import { RunChecksUseCase } from './run-checks.use-case';

function describeUnmet(result: CheckResult): string {
  const keys = result.missingKeys?.length ? ` (missing: ${result.missingKeys.join(', ')})` : '';
  return `${result.name}${keys}: ${result.error?.message ?? 'not ready'}`;
}

/**
 * Polls the check plan until every required check passes or the maximum wait
 * elapses. Sleeps are clamped to the remaining time and every request is cut
 * off at `maxWaitMs + intervalMs`, so a run never exceeds the maximum wait by
 * more than one polling interval.
 */
@Injectable()
export class WaitForDependenciesUseCase {
  private readonly logger = new Logger(WaitForDependenciesUseCase.name);

  constructor(
    private readonly runChecks: RunChecksUseCase,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(GATE_SETTINGS) private readonly settings: GateSettings,
  ) {}

  async execute(): Promise<WaitOutcome> {
    const { plan, intervalMs, maxWaitMs } = this.settings;
    const startedAt = this.clock.now();
    const deadline = startedAt + maxWaitMs + intervalMs;

    this.logger.log(
      `Waiting for ${plan.names.join(', ')} (interval ${intervalMs}ms, timeout ${maxWaitMs}ms)`,
    );

    for (let iteration = 1; ; iteration += 1) {
      const results = await this.runIteration(plan, iteration, deadline);
      const elapsedMs = this.clock.now() - startedAt;
      const next = WaitLoopStateMachine.getNextState(ReadinessState.POLLING, {
        allRequiredReady: results.every((r) => r.ok || !r.required),
        elapsedMs,
        maxWaitMs,
      });

      if (next === ReadinessState.ALL_READY || next === ReadinessState.TIMED_OUT) {
        return this.finish(next, iteration, elapsedMs, results);
      }

      const pending = results.filter((r) => r.required && !r.ok).map((r) => r.name);
      const delay = Math.min(intervalMs, maxWaitMs - elapsedMs);
      this.logger.log(`Still waiting on ${pending.join(', ')}; next attempt in ${delay}ms`);
      await this.clock.sleep(delay);
    }
  }

  private runIteration(
    plan: CheckPlan,
    iteration: number,
    deadline: number,
  ): Promise<CheckResult[]> {
    const runId = runContext.getStore()?.runId ?? 'standalone';
    return runContext.run({ runId, iteration }, () => this.runChecks.execute(plan, deadline));
  }

  private finish(
    state: TerminalReadinessState,
    iterations: number,
    elapsedMs: number,
    results: CheckResult[],
  ): WaitOutcome {
    const unmet = results.filter((r) => r.required && !r.ok);

    if (state === ReadinessState.ALL_READY) {
      this.logger.log(`All dependencies ready after ${iterations} iteration(s) in ${elapsedMs}ms`);
    } else {
      this.logger.error(
        `Timed out after ${elapsedMs}ms (${iterations} iterations); never ready: ${unmet
          .map(describeUnmet)
          .join('; ')}`,
      );
    }
    return { state, iterations, elapsedMs, results, unmet };
  }
}
