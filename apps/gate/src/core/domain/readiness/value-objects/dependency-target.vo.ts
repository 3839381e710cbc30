import { DependencyKind } from '@readiness-gate/shared';
import { ConfigError } from '../errors/config.error';

export interface Credentials {
  readonly username: string;
  readonly password?: string;
}

interface Endpoint {
  readonly host: string;
  readonly port: number;
}

export interface DatabaseTarget extends Endpoint {
  readonly kind: DependencyKind.DATABASE;
  readonly database?: string;
  readonly credentials?: Credentials;
}

export interface CacheTarget extends Endpoint {
  readonly kind: DependencyKind.CACHE;
  readonly db: number;
  readonly password?: string;
}

export interface BrokerTarget extends Endpoint {
  readonly kind: DependencyKind.BROKER;
  readonly vhost: string;
  readonly credentials?: Credentials;
}

export interface ConfigStoreTarget extends Endpoint {
  readonly kind: DependencyKind.CONFIG_STORE;
  readonly secure: boolean;
  readonly token?: string;
}

export type DependencyTarget = DatabaseTarget | CacheTarget | BrokerTarget | ConfigStoreTarget;
export type ProbeableTarget = Exclude<DependencyTarget, ConfigStoreTarget>;

const MAX_PORT = 65_535;

/** Validates the endpoint and returns a frozen copy of the target. */
export function createTarget<T extends DependencyTarget>(target: T): T {
  if (!target.host.trim()) {
    throw new ConfigError(`${target.kind} target has an empty host.`);
  }
  if (!Number.isInteger(target.port) || target.port < 1 || target.port > MAX_PORT) {
    throw new ConfigError(`${target.kind} target has an invalid port: ${target.port}.`);
  }
  const frozen = { ...target, host: target.host.trim() };
  Object.freeze(frozen);
  return frozen;
}

export function describeTarget(target: DependencyTarget): string {
  return `${target.host}:${target.port}`;
}
