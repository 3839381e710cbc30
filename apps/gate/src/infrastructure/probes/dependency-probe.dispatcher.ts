import { Injectable } from '@nestjs/common';
import { DependencyKind } from '@readiness-gate/shared';
import { DependencyProbe } from '@/application/ports/dependency-probe.port';
import { ProbeableTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { PostgresqlProbe } from './postgresql.probe';
import { RedisProbe } from './redis.probe';
import { RabbitmqProbe } from './rabbitmq.probe';

@Injectable()
export class DependencyProbeDispatcher implements DependencyProbe {
  constructor(
    private readonly postgresql: PostgresqlProbe,
    private readonly redis: RedisProbe,
    private readonly rabbitmq: RabbitmqProbe,
  ) {}

  probe(target: ProbeableTarget, timeoutMs: number): Promise<string> {
    switch (target.kind) {
      case DependencyKind.DATABASE:
        return this.postgresql.probe(target, timeoutMs);
      case DependencyKind.CACHE:
        return this.redis.probe(target, timeoutMs);
      case DependencyKind.BROKER:
        return this.rabbitmq.probe(target, timeoutMs);
    }
  }
}
