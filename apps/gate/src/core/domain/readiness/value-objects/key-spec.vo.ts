import { ConfigError } from '../errors/config.error';
import { KeyList } from './key-list.vo';

export interface KeySpecProps {
  prefix: string;
  mandatory: KeyList;
  optional: KeyList;
  sentinel: string;
}

export class KeySpec {
  private constructor(
    readonly prefix: string,
    readonly mandatory: KeyList,
    readonly optional: KeyList,
    readonly sentinel: string,
  ) {}

  static create(props: KeySpecProps): KeySpec {
    const prefix = props.prefix.trim().replace(/^\/+|\/+$/g, '');
    if (!prefix) {
      throw new ConfigError('Config-store prefix must name at least one path segment.');
    }
    if (props.mandatory.isEmpty) {
      throw new ConfigError('At least one mandatory config-store key is required.');
    }

    const sentinel = props.sentinel.trim();
    if (!KeyList.isValidKey(sentinel)) {
      throw new ConfigError(`Invalid connectivity sentinel key: "${props.sentinel}".`);
    }

    const overlap = props.mandatory.keys.filter((key) => props.optional.has(key));
    if (overlap.length > 0) {
      throw new ConfigError(`Keys listed as both mandatory and optional: ${overlap.join(', ')}.`);
    }

    return Object.freeze(new KeySpec(prefix, props.mandatory, props.optional, sentinel));
  }

  pathFor(key: string): string {
    return `${this.prefix}/${key}`;
  }
}
