import { Logger } from '@nestjs/common';
import { DependencyKind } from '@readiness-gate/shared';
import { Clock } from '../../src/application/ports/clock.port';
import { ConfigStore } from '../../src/application/ports/config-store.port';
import { AttemptBudget } from '../../src/application/services/attempt-budget';
import { GateSettings } from '../../src/application/settings/gate-settings';
import { CheckPlan } from '../../src/core/domain/readiness/entities/check-plan.entity';
import { KeyList } from '../../src/core/domain/readiness/value-objects/key-list.vo';
import { KeySpec } from '../../src/core/domain/readiness/value-objects/key-spec.vo';
import { ConfigStoreTarget } from '../../src/core/domain/readiness/value-objects/dependency-target.vo';

/** Time only moves when the code under test sleeps or a test advances it. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class InMemoryConfigStore implements ConfigStore {
  readonly reads: string[] = [];
  readonly timeouts: number[] = [];
  private readonly values: Map<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.values = new Map(Object.entries(entries));
  }

  async get(key: string, timeoutMs: number): Promise<string | undefined> {
    this.reads.push(key);
    this.timeouts.push(timeoutMs);
    return this.values.get(key);
  }

  put(key: string, value: string): void {
    this.values.set(key, value);
  }
}

export const consulTarget: ConfigStoreTarget = {
  kind: DependencyKind.CONFIG_STORE,
  host: 'consul',
  port: 8500,
  secure: false,
};

export function keySpec(mandatory: string, optional = '', sentinel = 'ping'): KeySpec {
  return KeySpec.create({
    prefix: 'app',
    mandatory: KeyList.parse(mandatory, 'CONSUL_MANDATORY_KEYS'),
    optional: KeyList.parse(optional, 'CONSUL_OPTIONAL_KEYS'),
    sentinel,
  });
}

export function gateSettings(plan: CheckPlan, overrides: Partial<GateSettings> = {}): GateSettings {
  return {
    intervalMs: 2_000,
    maxWaitMs: 60_000,
    probeTimeoutMs: 1_000,
    configStore: consulTarget,
    plan,
    ...overrides,
  };
}

/** A budget whose deadline never arrives: every request gets the full 1000ms. */
export function openBudget(): AttemptBudget {
  return new AttemptBudget(new FakeClock(), Number.POSITIVE_INFINITY, 1_000);
}

export function silenceNestLogger(): void {
  for (const level of ['log', 'warn', 'error', 'debug'] as const) {
    jest.spyOn(Logger.prototype, level).mockImplementation();
  }
}
