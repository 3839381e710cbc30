import { ErrorCode } from '@readiness-gate/shared';
import { DomainError } from './domain.error';

export class ConfigError extends DomainError {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
  }
}
