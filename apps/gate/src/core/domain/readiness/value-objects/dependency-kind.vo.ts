import { DependencyKind } from '@readiness-gate/shared';

export type ProbeKind = Exclude<DependencyKind, DependencyKind.CONFIG_STORE>;

const KEY_ALIASES = new Map<string, ProbeKind>([
  ['database', DependencyKind.DATABASE],
  ['postgresql', DependencyKind.DATABASE],
  ['postgres', DependencyKind.DATABASE],
  ['redis', DependencyKind.CACHE],
  ['cache', DependencyKind.CACHE],
  ['rabbitmq', DependencyKind.BROKER],
  ['broker', DependencyKind.BROKER],
]);

/** System name used for checks configured straight from the environment. */
export const SYSTEM_NAMES: Record<DependencyKind, string> = {
  [DependencyKind.DATABASE]: 'postgresql',
  [DependencyKind.CACHE]: 'redis',
  [DependencyKind.BROKER]: 'rabbitmq',
  [DependencyKind.CONFIG_STORE]: 'consul',
};

/** Maps a config-store key such as `DATABASE` or `redis` to the dependency it describes. */
export function kindForKey(key: string): ProbeKind | null {
  return KEY_ALIASES.get(key.toLowerCase()) ?? null;
}
