import { Inject, Injectable, Logger } from '@nestjs/common';
import { CONFIG_STORE, ConfigStore } from '@/application/ports/config-store.port';
import { AttemptBudget } from '@/application/services/attempt-budget';
import { MissingKeyError } from '@/core/domain/readiness/errors/missing-key.error';
import { KeySpec } from '@/core/domain/readiness/value-objects/key-spec.vo';

export interface ConfigStoreReport {
  missingOptionalKeys: string[];
}

@Injectable()
export class VerifyConfigStoreUseCase {
  private readonly logger = new Logger(VerifyConfigStoreUseCase.name);

  constructor(@Inject(CONFIG_STORE) private readonly store: ConfigStore) {}

  /**
   * Confirms the store answers for the sentinel key, then that every mandatory
   * key exists. Missing optional keys are reported, never thrown.
   */
  async execute(keySpec: KeySpec, budget: AttemptBudget): Promise<ConfigStoreReport> {
    const sentinelPath = keySpec.pathFor(keySpec.sentinel);
    if ((await this.store.get(sentinelPath, budget.next())) === undefined) {
      throw new MissingKeyError(
        [keySpec.sentinel],
        `Connectivity sentinel key "${sentinelPath}" not found`,
      );
    }

    const missingMandatory = await this.findMissing(keySpec, keySpec.mandatory.keys, budget);
    const missingOptional = await this.findMissing(keySpec, keySpec.optional.keys, budget);

    if (missingOptional.length > 0) {
      this.logger.log(`Optional keys not present: ${missingOptional.join(', ')}`);
    }
    if (missingMandatory.length > 0) {
      throw new MissingKeyError(missingMandatory);
    }
    return { missingOptionalKeys: missingOptional };
  }

  private async findMissing(
    keySpec: KeySpec,
    keys: readonly string[],
    budget: AttemptBudget,
  ): Promise<string[]> {
    const missing: string[] = [];
    for (const key of keys) {
      if ((await this.store.get(keySpec.pathFor(key), budget.next())) === undefined) {
        missing.push(key);
      }
    }
    return missing;
  }
}
