import { Inject, Injectable, Logger } from '@nestjs/common';
import { CheckError, CheckResult, DependencyKind, ErrorCode } from '@readiness-gate/shared';
import { CLOCK, Clock } from '@/application/ports/clock.port';
import { DEPENDENCY_PROBE, DependencyProbe } from '@/application/ports/dependency-probe.port';
import { AttemptBudget } from '@/application/services/attempt-budget';
import { TargetResolver } from '@/application/services/target-resolver.service';
import { GATE_SETTINGS, GateSettings } from '@/application/settings/gate-settings';
import { CheckDefinition, CheckPlan } from '@/core/domain/readiness/entities/check-plan.entity';
import { DomainError } from '@/core/domain/readiness/errors/domain.error';
import { MissingKeyError } from '@/core/domain/readiness/errors/missing-key.error';
import { describeTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { VerifyConfigStoreUseCase } from './verify-config-store.use-case';

function toCheckError(error: unknown): CheckError {
  if (error instanceof DomainError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: ErrorCode.CONNECTION_UNREACHABLE,
    message: error instanceof Error ? error.message : String(error),
  };
}

interface AttemptReport {
  endpoint: string;
  missingOptionalKeys?: string[];
}

/**
 * Runs every check of a plan once, in order. Failures become results, never
 * exceptions. No request outlives `deadline`.
 */
@Injectable()
export class RunChecksUseCase {
  private readonly logger = new Logger(RunChecksUseCase.name);

  constructor(
    @Inject(DEPENDENCY_PROBE) private readonly probe: DependencyProbe,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(GATE_SETTINGS) private readonly settings: GateSettings,
    private readonly verifyConfigStore: VerifyConfigStoreUseCase,
    private readonly targetResolver: TargetResolver,
  ) {}

  async execute(plan: CheckPlan, deadline: number): Promise<CheckResult[]> {
    const budget = new AttemptBudget(this.clock, deadline, this.settings.probeTimeoutMs);
    const results: CheckResult[] = [];
    for (const check of plan.checks) {
      results.push(await this.runOne(check, plan, budget));
    }
    return results;
  }

  private async runOne(
    check: CheckDefinition,
    plan: CheckPlan,
    budget: AttemptBudget,
  ): Promise<CheckResult> {
    const started = this.clock.now();
    const base = { name: check.name, kind: check.kind, required: check.required };

    try {
      const { endpoint, missingOptionalKeys } = await this.attempt(check, plan, budget);
      this.logger.log(`${check.name} connection successful: ${endpoint}`);
      return {
        ...base,
        ok: true,
        endpoint,
        missingOptionalKeys,
        latencyMs: this.clock.now() - started,
        checkedAt: new Date().toISOString(),
      };
    } catch (error) {
      const failure = toCheckError(error);
      const line = `${check.name} connection failed: [${failure.code}] ${failure.message}`;
      if (check.required) {
        this.logger.warn(line);
      } else {
        this.logger.debug(line);
      }
      return {
        ...base,
        ok: false,
        error: failure,
        missingKeys: error instanceof MissingKeyError ? [...error.keys] : undefined,
        latencyMs: this.clock.now() - started,
        checkedAt: new Date().toISOString(),
      };
    }
  }

  private async attempt(
    check: CheckDefinition,
    plan: CheckPlan,
    budget: AttemptBudget,
  ): Promise<AttemptReport> {
    if (check.kind === DependencyKind.CONFIG_STORE) {
      const { missingOptionalKeys } = await this.verifyConfigStore.execute(check.keySpec, budget);
      return { endpoint: describeTarget(this.settings.configStore), missingOptionalKeys };
    }
    const target = await this.targetResolver.resolve(check, plan.keySpec, budget);
    return { endpoint: await this.probe.probe(target, budget.next()) };
  }
}
