import { ConfigError } from '../errors/config.error';

/**
 * Ordered, duplicate-free list of config-store key names parsed from a
 * comma-separated string. Malformed entries are rejected rather than dropped.
 */
export class KeyList {
  private static readonly PATTERN = /^[A-Za-z0-9_.-]+(\/[A-Za-z0-9_.-]+)*$/;

  private constructor(private readonly _keys: readonly string[]) {}

  static empty(): KeyList {
    return new KeyList([]);
  }

  /**
   * @param label - names the list in error messages, e.g. the variable it came from
   */
  static parse(raw: string | undefined, label: string): KeyList {
    if (raw === undefined || raw.trim() === '') {
      return KeyList.empty();
    }

    const entries = raw.split(',').map((entry) => entry.trim());
    const seen = new Set<string>();
    const issues: string[] = [];

    entries.forEach((entry, index) => {
      if (entry === '') {
        issues.push(`entry ${index + 1} is empty`);
      } else if (!KeyList.isValidKey(entry)) {
        issues.push(`"${entry}" is not a valid key name`);
      } else if (seen.has(entry)) {
        issues.push(`"${entry}" is listed more than once`);
      } else {
        seen.add(entry);
      }
    });

    if (issues.length > 0) {
      throw new ConfigError(`${label} is malformed: ${issues.join('; ')}`, issues);
    }
    return new KeyList(Object.freeze(entries));
  }

  static isValidKey(key: string): boolean {
    return KeyList.PATTERN.test(key);
  }

  get keys(): readonly string[] {
    return this._keys;
  }

  get isEmpty(): boolean {
    return this._keys.length === 0;
  }

  has(key: string): boolean {
    return this._keys.includes(key);
  }
}
