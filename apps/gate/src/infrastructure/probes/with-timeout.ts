import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';

/**
 * Races an attempt against its timeout. When the timer wins, `onTimeout` tears
 * down whatever the attempt has opened so a hung client does not keep the
 * process alive; the attempt's own `finally` still runs if it ever settles.
 */
export async function withTimeout<T>(
  attempt: Promise<T>,
  ms: number,
  endpoint: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new ConnectionError('timeout', `${endpoint} did not answer within ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([attempt, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
