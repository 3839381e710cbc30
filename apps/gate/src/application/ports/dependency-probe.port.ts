import { ProbeableTarget } from '@/core/domain/readiness/value-objects/dependency-target.vo';

export const DEPENDENCY_PROBE = Symbol('DEPENDENCY_PROBE');

export interface DependencyProbe {
  /**
   * Opens one transient connection to the target, exercises it and closes it,
   * giving up after `timeoutMs`. Resolves with the endpoint that answered.
   */
  probe(target: ProbeableTarget, timeoutMs: number): Promise<string>;
}
