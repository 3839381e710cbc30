import { AuthError } from '@/core/domain/readiness/errors/auth.error';
import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';
import { DomainError } from '@/core/domain/readiness/errors/domain.error';

export type AuthFailureMatcher = (error: Error) => boolean;

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'ECONNABORTED']);
const TIMEOUT_NAMES = new Set(['AbortError', 'TimeoutError']);
const TIMEOUT_MESSAGE = /timed? ?out|timeout/i;

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

// HTTP clients may wrap the socket error in `cause`
function describe(error: Error): { code?: string; detail: string } {
  const cause = error.cause instanceof Error ? error.cause : undefined;
  return {
    code: errorCode(error) ?? errorCode(cause),
    detail: cause ? `${error.message} (${cause.message})` : error.message,
  };
}

/** Maps a client library error onto the probe failure taxonomy. */
export function classifyProbeFailure(
  error: unknown,
  isAuthFailure: AuthFailureMatcher,
  endpoint: string,
): DomainError {
  if (error instanceof DomainError) return error;

  const err = error instanceof Error ? error : new Error(String(error));
  if (isAuthFailure(err)) {
    return new AuthError(`${endpoint} rejected the credentials: ${err.message}`);
  }
  const { code, detail } = describe(err);
  if (
    (code !== undefined && TIMEOUT_CODES.has(code)) ||
    TIMEOUT_NAMES.has(err.name) ||
    TIMEOUT_MESSAGE.test(detail)
  ) {
    return new ConnectionError('timeout', `${endpoint} timed out: ${detail}`);
  }
  return new ConnectionError('unreachable', `${endpoint} is unreachable: ${detail || code}`);
}
