import { Logger } from '@nestjs/common';
import { DependencyKind, ErrorCode } from '@readiness-gate/shared';
import { RunChecksUseCase } from '../../../src/application/use-cases/readiness/run-checks.use-case';
import { VerifyConfigStoreUseCase } from '../../../src/application/use-cases/readiness/verify-config-store.use-case';
import { TargetResolver } from '../../../src/application/services/target-resolver.service';
import { DependencyProbe } from '../../../src/application/ports/dependency-probe.port';
import { CheckPlan } from '../../../src/core/domain/readiness/entities/check-plan.entity';
import { AuthError } from '../../../src/core/domain/readiness/errors/auth.error';
import {
  CacheTarget,
  DatabaseTarget,
} from '../../../src/core/domain/readiness/value-objects/dependency-target.vo';
import { FakeClock, InMemoryConfigStore, gateSettings, keySpec } from '../support';

describe('RunChecksUseCase', () => {
  const noDeadline = Number.POSITIVE_INFINITY;
  const database: DatabaseTarget = { kind: DependencyKind.DATABASE, host: 'pg', port: 5432 };
  const cache: CacheTarget = { kind: DependencyKind.CACHE, host: 'cache', port: 6379, db: 0 };

  let probe: jest.Mocked<DependencyProbe>;
  let clock: FakeClock;
  let warnSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    probe = { probe: jest.fn() };
    clock = new FakeClock(1_000);
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    debugSpy = jest.spyOn(Logger.prototype, 'debug').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function useCase(plan: CheckPlan, store = new InMemoryConfigStore()): RunChecksUseCase {
    return new RunChecksUseCase(
      probe,
      clock,
      gateSettings(plan),
      new VerifyConfigStoreUseCase(store),
      new TargetResolver(store),
    );
  }

  it('should probe every check in plan order and time each one', async () => {
    const plan = CheckPlan.create({ targets: [database, cache] });
    probe.probe.mockImplementation(async (target) => {
      clock.advance(target.kind === DependencyKind.DATABASE ? 40 : 5);
      return `${target.host}:${target.port}`;
    });

    const results = await useCase(plan).execute(plan, noDeadline);

    expect(results.map((r) => [r.name, r.ok, r.latencyMs, r.endpoint])).toEqual([
      ['postgresql', true, 40, 'pg:5432'],
      ['redis', true, 5, 'cache:6379'],
    ]);
    expect(probe.probe).toHaveBeenNthCalledWith(1, database, 1_000);
    expect(logSpy).toHaveBeenCalledWith('postgresql connection successful: pg:5432');
    expect(results[0].checkedAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('should keep going after a failing check', async () => {
    const plan = CheckPlan.create({ targets: [database, cache] });
    probe.probe
      .mockRejectedValueOnce(new AuthError('pg:5432 rejected the credentials'))
      .mockResolvedValueOnce('cache:6379');

    const results = await useCase(plan).execute(plan, noDeadline);

    expect(results[0]).toMatchObject({
      name: 'postgresql',
      ok: false,
      error: { code: ErrorCode.AUTH_REJECTED, message: 'pg:5432 rejected the credentials' },
    });
    expect(results[1].ok).toBe(true);
    expect(warnSpy).toHaveBeenCalledWith(
      'postgresql connection failed: [AUTH_REJECTED] pg:5432 rejected the credentials',
    );
  });

  it('should classify unknown errors as unreachable', async () => {
    const plan = CheckPlan.create({ targets: [cache] });
    probe.probe.mockRejectedValue(new Error('boom'));

    const [result] = await useCase(plan).execute(plan, noDeadline);

    expect(result.error).toEqual({ code: ErrorCode.CONNECTION_UNREACHABLE, message: 'boom' });
  });

  it('should verify the config store and report missing keys', async () => {
    const plan = CheckPlan.create({ keySpec: keySpec('settings'), targets: [] });
    const store = new InMemoryConfigStore({ 'app/ping': 'ok' });

    const [result] = await useCase(plan, store).execute(plan, noDeadline);

    expect(result).toMatchObject({
      name: 'consul',
      kind: DependencyKind.CONFIG_STORE,
      ok: false,
      missingKeys: ['settings'],
      error: { code: ErrorCode.MISSING_KEY },
    });
    expect(probe.probe).not.toHaveBeenCalled();
  });

  it('should report the config store endpoint on success', async () => {
    const plan = CheckPlan.create({ keySpec: keySpec('settings'), targets: [] });
    const store = new InMemoryConfigStore({ 'app/ping': 'ok', 'app/settings': '{}' });

    const [result] = await useCase(plan, store).execute(plan, noDeadline);

    expect(result).toMatchObject({ name: 'consul', ok: true, endpoint: 'consul:8500' });
  });

  it('should carry missing optional keys on a passing config store check', async () => {
    const plan = CheckPlan.create({ keySpec: keySpec('settings', 'flags,limits'), targets: [] });
    const store = new InMemoryConfigStore({
      'app/ping': 'ok',
      'app/settings': '{}',
      'app/limits': '{}',
    });

    const [result] = await useCase(plan, store).execute(plan, noDeadline);

    expect(result).toMatchObject({ name: 'consul', ok: true, missingOptionalKeys: ['flags'] });
  });

  it('should shorten the probe timeout to the time left before the deadline', async () => {
    const plan = CheckPlan.create({ targets: [database] });
    probe.probe.mockResolvedValue('pg:5432');

    await useCase(plan).execute(plan, clock.now() + 300);

    expect(probe.probe).toHaveBeenCalledWith(database, 300);
  });

  it('should fail a check as timed out without probing once the deadline has passed', async () => {
    const plan = CheckPlan.create({ targets: [database] });

    const [result] = await useCase(plan).execute(plan, clock.now());

    expect(result).toMatchObject({
      name: 'postgresql',
      ok: false,
      error: {
        code: ErrorCode.CONNECTION_TIMEOUT,
        message: 'No time left before the maximum wait elapses',
      },
    });
    expect(probe.probe).not.toHaveBeenCalled();
  });

  it('should log optional failures at debug level', async () => {
    const plan = CheckPlan.create({ keySpec: keySpec('settings', 'redis'), targets: [] });
    const store = new InMemoryConfigStore({ 'app/ping': 'ok', 'app/settings': '{}' });

    const results = await useCase(plan, store).execute(plan, noDeadline);

    expect(results[1]).toMatchObject({ name: 'redis', required: false, ok: false, missingKeys: ['redis'] });
    expect(debugSpy).toHaveBeenCalledWith(
      'redis connection failed: [MISSING_KEY] Config-store key "app/redis" not found',
    );
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
