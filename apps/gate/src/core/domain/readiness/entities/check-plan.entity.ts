import { DependencyKind } from '@readiness-gate/shared';
import { ConfigError } from '../errors/config.error';
import { KeySpec } from '../value-objects/key-spec.vo';
import { ProbeKind, SYSTEM_NAMES, kindForKey } from '../value-objects/dependency-kind.vo';
import { ProbeableTarget } from '../value-objects/dependency-target.vo';

export type CheckSource =
  | { readonly type: 'environment'; readonly target: ProbeableTarget }
  | { readonly type: 'config-store'; readonly key: string };

export interface ConfigStoreCheck {
  readonly name: string;
  readonly kind: DependencyKind.CONFIG_STORE;
  readonly required: true;
  readonly keySpec: KeySpec;
}

export interface DependencyCheck {
  readonly name: string;
  readonly kind: ProbeKind;
  readonly required: boolean;
  readonly source: CheckSource;
}

export type CheckDefinition = ConfigStoreCheck | DependencyCheck;

export interface CheckPlanProps {
  keySpec?: KeySpec;
  targets: readonly ProbeableTarget[];
}

/**
 * The ordered set of checks a gate run polls: the config store first, then the
 * dependencies configured by environment, then those described by config-store
 * keys. Each dependency kind is probed at most once; the environment wins.
 */
export class CheckPlan {
  private constructor(
    private readonly _checks: readonly CheckDefinition[],
    readonly keySpec: KeySpec | null,
  ) {}

  static create(props: CheckPlanProps): CheckPlan {
    const checks: CheckDefinition[] = [];
    const covered = new Set<ProbeKind>();
    const { keySpec } = props;

    if (keySpec) {
      checks.push({
        name: SYSTEM_NAMES[DependencyKind.CONFIG_STORE],
        kind: DependencyKind.CONFIG_STORE,
        required: true,
        keySpec,
      });
    }

    for (const target of props.targets) {
      if (covered.has(target.kind)) {
        throw new ConfigError(`${SYSTEM_NAMES[target.kind]} is configured more than once.`);
      }
      covered.add(target.kind);
      checks.push({
        name: SYSTEM_NAMES[target.kind],
        kind: target.kind,
        required: true,
        source: { type: 'environment', target },
      });
    }

    if (keySpec) {
      const addKeyChecks = (keys: readonly string[], required: boolean): void => {
        for (const key of keys) {
          const kind = kindForKey(key);
          if (!kind || covered.has(kind)) continue;
          covered.add(kind);
          checks.push({ name: key, kind, required, source: { type: 'config-store', key } });
        }
      };
      addKeyChecks(keySpec.mandatory.keys, true);
      addKeyChecks(keySpec.optional.keys, false);
    }

    if (checks.length === 0) {
      throw new ConfigError('No dependencies are configured to wait for.');
    }
    return new CheckPlan(Object.freeze(checks), keySpec ?? null);
  }

  get checks(): readonly CheckDefinition[] {
    return this._checks;
  }

  get names(): string[] {
    return this._checks.map((check) => (check.required ? check.name : `${check.name}?`));
  }
}
