import { ErrorCode } from '@readiness-gate/shared';
import { DomainError } from './domain.error';

export class MissingKeyError extends DomainError {
  readonly code = ErrorCode.MISSING_KEY;
  constructor(
    readonly keys: readonly string[],
    message = `Missing config-store key(s): ${keys.join(', ')}`,
  ) {
    super(message);
  }
}
