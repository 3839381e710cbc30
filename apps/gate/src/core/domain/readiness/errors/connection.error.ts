import { ErrorCode } from '@readiness-gate/shared';
import { DomainError } from './domain.error';

export type ConnectionFailureReason = 'timeout' | 'unreachable';

export class ConnectionError extends DomainError {
  readonly code: ErrorCode.CONNECTION_TIMEOUT | ErrorCode.CONNECTION_UNREACHABLE;

  constructor(
    readonly reason: ConnectionFailureReason,
    message: string,
  ) {
    super(message);
    this.code =
      reason === 'timeout' ? ErrorCode.CONNECTION_TIMEOUT : ErrorCode.CONNECTION_UNREACHABLE;
  }
}
