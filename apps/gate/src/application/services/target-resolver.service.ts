import { Inject, Injectable } from '@nestjs/common';
import { DependencyKind } from '@readiness-gate/shared';
import { z } from 'zod';
import { CONFIG_STORE, ConfigStore } from '@/application/ports/config-store.port';
import { AttemptBudget } from './attempt-budget';
import { DependencyCheck } from '@/core/domain/readiness/entities/check-plan.entity';
import { ConfigError } from '@/core/domain/readiness/errors/config.error';
import { MissingKeyError } from '@/core/domain/readiness/errors/missing-key.error';
import { KeySpec } from '@/core/domain/readiness/value-objects/key-spec.vo';
import {
  BrokerTarget,
  CacheTarget,
  DatabaseTarget,
  ProbeableTarget,
  createTarget,
} from '@/core/domain/readiness/value-objects/dependency-target.vo';

const port = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const optionalText = z.string().min(1).optional();

const databaseDocument = z.object({
  DB_HOST: z.string().min(1),
  DB_PORT: port(5432),
  DB_USER: optionalText,
  DB_PASS: z.string().optional(),
  DB_NAME: optionalText,
});

const cacheDocument = z.object({
  REDIS_HOST: z.string().min(1),
  REDIS_PORT: port(6379),
  REDIS_PASSWORD: optionalText,
  REDIS_DB: z.coerce.number().int().min(0).default(0),
});

const brokerDocument = z.object({
  RABBITMQ_HOSTNAME: z.string().min(1),
  RABBITMQ_PORT: port(5672),
  RABBITMQ_USERNAME: optionalText,
  RABBITMQ_PASSWORD: z.string().optional(),
  RABBITMQ_VHOST: z.string().min(1).default('/'),
});

function parseDocument<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Config-store document "${path}" is invalid: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Turns a dependency check into a concrete connection target. Targets described
 * by a config-store key are re-read on every call so that a document written
 * while the gate is waiting is picked up.
 */
@Injectable()
export class TargetResolver {
  constructor(@Inject(CONFIG_STORE) private readonly store: ConfigStore) {}

  async resolve(
    check: DependencyCheck,
    keySpec: KeySpec | null,
    budget: AttemptBudget,
  ): Promise<ProbeableTarget> {
    const { source } = check;
    if (source.type === 'environment') {
      return source.target;
    }
    if (!keySpec) {
      throw new ConfigError(`${check.name} is read from the config store, but no prefix is set.`);
    }

    const path = keySpec.pathFor(source.key);
    const raw = await this.store.get(path, budget.next());
    if (raw === undefined) {
      throw new MissingKeyError([source.key], `Config-store key "${path}" not found`);
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch {
      throw new ConfigError(`Config-store document "${path}" is not valid JSON.`);
    }
    return this.toTarget(check, document, path);
  }

  private toTarget(check: DependencyCheck, document: unknown, path: string): ProbeableTarget {
    switch (check.kind) {
      case DependencyKind.DATABASE: {
        const doc = parseDocument(databaseDocument, document, path);
        return createTarget<DatabaseTarget>({
          kind: DependencyKind.DATABASE,
          host: doc.DB_HOST,
          port: doc.DB_PORT,
          database: doc.DB_NAME,
          credentials: doc.DB_USER ? { username: doc.DB_USER, password: doc.DB_PASS } : undefined,
        });
      }
      case DependencyKind.CACHE: {
        const doc = parseDocument(cacheDocument, document, path);
        return createTarget<CacheTarget>({
          kind: DependencyKind.CACHE,
          host: doc.REDIS_HOST,
          port: doc.REDIS_PORT,
          db: doc.REDIS_DB,
          password: doc.REDIS_PASSWORD,
        });
      }
      case DependencyKind.BROKER: {
        const doc = parseDocument(brokerDocument, document, path);
        return createTarget<BrokerTarget>({
          kind: DependencyKind.BROKER,
          host: doc.RABBITMQ_HOSTNAME,
          port: doc.RABBITMQ_PORT,
          vhost: doc.RABBITMQ_VHOST,
          credentials: doc.RABBITMQ_USERNAME
            ? { username: doc.RABBITMQ_USERNAME, password: doc.RABBITMQ_PASSWORD }
            : undefined,
        });
      }
    }
  }
}
