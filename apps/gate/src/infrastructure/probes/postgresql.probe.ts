import { Inject, Injectable, Logger } from '@nestjs/common';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import {
  DatabaseTarget,
  describeTarget,
} from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { classifyProbeFailure, errorCode } from './probe-failure';
import { withTimeout } from './with-timeout';

export const DATA_SOURCE_FACTORY = Symbol('DATA_SOURCE_FACTORY');

export interface DataSourceLike {
  readonly isInitialized: boolean;
  initialize(): Promise<unknown>;
  query(sql: string): Promise<unknown>;
  destroy(): Promise<void>;
}

export type DataSourceFactory = (options: PostgresConnectionOptions) => DataSourceLike;

// invalid_password, invalid_authorization_specification
const AUTH_SQLSTATES = new Set(['28P01', '28000']);

export const isPostgresAuthFailure = (error: Error): boolean =>
  AUTH_SQLSTATES.has(errorCode(error) ?? '');

@Injectable()
export class PostgresqlProbe {
  private readonly logger = new Logger(PostgresqlProbe.name);

  constructor(@Inject(DATA_SOURCE_FACTORY) private readonly createDataSource: DataSourceFactory) {}

  async probe(target: DatabaseTarget, timeoutMs: number): Promise<string> {
    const endpoint = describeTarget(target);
    const dataSource = this.createDataSource({
      type: 'postgres',
      host: target.host,
      port: target.port,
      username: target.credentials?.username,
      password: target.credentials?.password,
      database: target.database,
      connectTimeoutMS: timeoutMs,
      logging: false,
      extra: { max: 1 },
    });

    let released = false;
    const release = async (): Promise<void> => {
      if (released || !dataSource.isInitialized) return;
      released = true;
      await dataSource.destroy();
    };

    const attempt = async (): Promise<void> => {
      try {
        await dataSource.initialize();
        await dataSource.query('SELECT datname FROM pg_database');
      } finally {
        await release();
      }
    };

    const abandon = (): void => {
      release().catch((error: unknown) =>
        this.logger.debug(`${endpoint} destroy failed: ${String(error)}`),
      );
    };

    try {
      await withTimeout(attempt(), timeoutMs, endpoint, abandon);
      return endpoint;
    } catch (error) {
      throw classifyProbeFailure(error, isPostgresAuthFailure, endpoint);
    }
  }
}
