import { CheckPlan } from '@/core/domain/readiness/entities/check-plan.entity';
import { ConfigStoreTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';

export const GATE_SETTINGS = Symbol('GATE_SETTINGS');

export interface GateSettings {
  intervalMs: number;
  maxWaitMs: number;
  probeTimeoutMs: number;
  configStore: ConfigStoreTarget;
  plan: CheckPlan;
}
