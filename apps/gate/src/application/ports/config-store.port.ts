export const CONFIG_STORE = Symbol('CONFIG_STORE');

export interface ConfigStore {
  /**
   * Reads one key over a fresh request bounded by `timeoutMs`. Resolves
   * `undefined` when the key does not exist and rejects with a typed connection
   * or auth failure otherwise.
   */
  get(key: string, timeoutMs: number): Promise<string | undefined>;
}
