import { DependencyKind } from '@readiness-gate/shared';
import { GateSettings } from '@/application/settings/gate-settings';
import { CheckPlan } from '@/core/domain/readiness/entities/check-plan.entity';
import { ConfigError } from '@/core/domain/readiness/errors/config.error';
import {
  BrokerTarget,
  CacheTarget,
  ConfigStoreTarget,
  DatabaseTarget,
  ProbeableTarget,
  createTarget,
} from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { KeyList } from '@/core/domain/readiness/value-objects/key-list.vo';
import { KeySpec } from '@/core/domain/readiness/value-objects/key-spec.vo';
import { EnvConfig } from './env.validation';

function databaseTargetFromUrl(raw: string): DatabaseTarget {
  const url = new URL(raw);
  const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
  return createTarget<DatabaseTarget>({
    kind: DependencyKind.DATABASE,
    host: url.hostname,
    port: url.port ? Number(url.port) : 5432,
    database: database || undefined,
    credentials: url.username
      ? {
          username: decodeURIComponent(url.username),
          password: url.password ? decodeURIComponent(url.password) : undefined,
        }
      : undefined,
  });
}

function keySpecFrom(env: EnvConfig): KeySpec | undefined {
  if (!env.CONSUL_PREFIX) return undefined;
  return KeySpec.create({
    prefix: env.CONSUL_PREFIX,
    mandatory: KeyList.parse(env.CONSUL_MANDATORY_KEYS, 'CONSUL_MANDATORY_KEYS'),
    optional: KeyList.parse(env.CONSUL_OPTIONAL_KEYS, 'CONSUL_OPTIONAL_KEYS'),
    sentinel: env.CONSUL_CONNECTION_CHECK_KEY ?? '',
  });
}

function environmentTargets(env: EnvConfig): ProbeableTarget[] {
  const targets: ProbeableTarget[] = [];
  if (env.DATABASE_URL) {
    targets.push(databaseTargetFromUrl(env.DATABASE_URL));
  }
  if (env.REDIS_HOST) {
    targets.push(
      createTarget<CacheTarget>({
        kind: DependencyKind.CACHE,
        host: env.REDIS_HOST,
        port: env.REDIS_PORT,
        db: env.REDIS_DB,
        password: env.REDIS_PASSWORD,
      }),
    );
  }
  if (env.RABBITMQ_HOST) {
    targets.push(
      createTarget<BrokerTarget>({
        kind: DependencyKind.BROKER,
        host: env.RABBITMQ_HOST,
        port: env.RABBITMQ_PORT,
        vhost: env.RABBITMQ_VHOST,
        credentials: env.RABBITMQ_USERNAME
          ? { username: env.RABBITMQ_USERNAME, password: env.RABBITMQ_PASSWORD }
          : undefined,
      }),
    );
  }
  return targets;
}

/** Maps the validated environment onto the settings a gate run works from. */
export function createGateSettings(env: EnvConfig): GateSettings {
  const keySpec = keySpecFrom(env);
  const targets = environmentTargets(env);
  if (!keySpec && targets.length === 0) {
    throw new ConfigError(
      'No dependencies configured: set CONSUL_PREFIX, DATABASE_URL, REDIS_HOST or RABBITMQ_HOST.',
    );
  }

  return {
    intervalMs: env.WAIT_INTERVAL_MS,
    maxWaitMs: env.WAIT_TIMEOUT_MS,
    probeTimeoutMs: env.PROBE_TIMEOUT_MS,
    configStore: createTarget<ConfigStoreTarget>({
      kind: DependencyKind.CONFIG_STORE,
      host: env.CONSUL_HOST,
      port: env.CONSUL_PORT,
      secure: env.CONSUL_SCHEME === 'https',
      token: env.CONSUL_TOKEN,
    }),
    plan: CheckPlan.create({ keySpec, targets }),
  };
}
