import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ConfigStore } from '@/application/ports/config-store.port';
import { GATE_SETTINGS, GateSettings } from '@/application/settings/gate-settings';
import { AuthError } from '@/core/domain/readiness/errors/auth.error';
import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';
import { DomainError } from '@/core/domain/readiness/errors/domain.error';
import { describeTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';
import { classifyProbeFailure } from '../probes/probe-failure';
import { withTimeout } from '../probes/with-timeout';

export const CONSUL_CLIENT_FACTORY = Symbol('CONSUL_CLIENT_FACTORY');

export interface ConsulClientOptions {
  host: string;
  port: number;
  secure: boolean;
  defaults?: { token?: string };
}

export interface ConsulKvClient {
  kv: {
    get(options: { key: string; timeout: number }): Promise<unknown>;
  };
}

export type ConsulClientFactory = (options: ConsulClientOptions) => ConsulKvClient;

// The client decodes `Value`; Consul sends null for a key stored without one.
const kvEntry = z.object({ Value: z.string().nullable().optional() });

const never = (): boolean => false;

function httpStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/** Reads Consul KV entries through the `consul` client, one request per key. */
@Injectable()
export class ConsulConfigStore implements ConfigStore {
  private readonly client: ConsulKvClient;
  private readonly endpoint: string;

  constructor(
    @Inject(CONSUL_CLIENT_FACTORY) createClient: ConsulClientFactory,
    @Inject(GATE_SETTINGS) settings: GateSettings,
  ) {
    const target = settings.configStore;
    this.endpoint = describeTarget(target);
    this.client = createClient({
      host: target.host,
      port: target.port,
      secure: target.secure,
      defaults: target.token ? { token: target.token } : undefined,
    });
  }

  async get(key: string, timeoutMs: number): Promise<string | undefined> {
    let entry: unknown;
    try {
      const request = this.client.kv.get({ key, timeout: timeoutMs });
      entry = await withTimeout(request, timeoutMs, this.endpoint);
    } catch (error) {
      throw this.classify(error);
    }

    if (entry === undefined || entry === null) return undefined;
    const parsed = kvEntry.safeParse(entry);
    if (!parsed.success) {
      throw new ConnectionError(
        'unreachable',
        `${this.endpoint} returned an unreadable entry for ${key}`,
      );
    }
    return parsed.data.Value ?? '';
  }

  private classify(error: unknown): DomainError {
    const status = httpStatus(error);
    if (status === 401 || status === 403) {
      return new AuthError(`${this.endpoint} rejected the ACL token (HTTP ${status})`);
    }
    if (status !== undefined) {
      return new ConnectionError('unreachable', `${this.endpoint} answered HTTP ${status}`);
    }
    return classifyProbeFailure(error, never, this.endpoint);
  }
}
