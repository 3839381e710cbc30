import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RedisOptions } from 'ioredis';
import { CacheTarget, describeTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';
import { classifyProbeFailure } from './probe-failure';
import { withTimeout } from './with-timeout';

export const REDIS_CLIENT_FACTORY = Symbol('REDIS_CLIENT_FACTORY');

export interface RedisProbeClient {
  connect(): Promise<void>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  disconnect(): void;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type RedisClientFactory = (options: RedisOptions) => RedisProbeClient;

const AUTH_REPLY = /WRONGPASS|NOAUTH/;
const PROBE_KEY_TTL_MS = 10_000;

export const isRedisAuthFailure = (error: Error): boolean => AUTH_REPLY.test(error.message);

@Injectable()
export class RedisProbe {
  private readonly logger = new Logger(RedisProbe.name);

  constructor(@Inject(REDIS_CLIENT_FACTORY) private readonly createClient: RedisClientFactory) {}

  async probe(target: CacheTarget, timeoutMs: number): Promise<string> {
    const endpoint = describeTarget(target);
    const client = this.createClient({
      host: target.host,
      port: target.port,
      password: target.password,
      db: target.db,
      lazyConnect: true,
      connectTimeout: timeoutMs,
      commandTimeout: timeoutMs,
      maxRetriesPerRequest: 0,
      retryStrategy: () => null,
      enableOfflineQueue: false,
    });
    // Without a listener ioredis re-emits socket errors as unhandled events.
    client.on('error', (error) => this.logger.debug(`${endpoint} client error: ${error.message}`));

    const attempt = async (): Promise<void> => {
      try {
        await client.connect();
        const key = `readiness-gate:${randomUUID()}`;
        const value = randomUUID();
        await client.set(key, value, 'PX', PROBE_KEY_TTL_MS);
        const readBack = await client.get(key);
        await client.del(key);
        if (readBack !== value) {
          throw new ConnectionError('unreachable', `${endpoint} returned a different value for ${key}`);
        }
      } finally {
        client.disconnect();
      }
    };

    try {
      await withTimeout(attempt(), timeoutMs, endpoint, () => client.disconnect());
      return endpoint;
    } catch (error) {
      throw classifyProbeFailure(error, isRedisAuthFailure, endpoint);
    }
  }
}
