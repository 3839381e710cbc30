export enum DependencyKind {
  DATABASE = 'database',
  CACHE = 'cache',
  BROKER = 'broker',
  CONFIG_STORE = 'config-store',
}
