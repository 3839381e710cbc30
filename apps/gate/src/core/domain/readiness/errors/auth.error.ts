import { ErrorCode } from '@readiness-gate/shared';
import { DomainError } from './domain.error';

export class AuthError extends DomainError {
  readonly code = ErrorCode.AUTH_REJECTED;
  constructor(message: string) {
    super(message);
  }
}
