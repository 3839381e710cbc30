import { Clock } from '@/application/ports/clock.port';
import { ConnectionError } from '@/core/domain/readiness/errors/connection.error';

/**
 * Hands out per-request timeouts that never reach past the end of the wait:
 * each one is the probe timeout or the time left, whichever is shorter.
 */
export class AttemptBudget {
  constructor(
    private readonly clock: Clock,
    private readonly deadline: number,
    private readonly probeTimeoutMs: number,
  ) {}

  next(): number {
    const remaining = this.deadline - this.clock.now();
    if (remaining <= 0) {
      throw new ConnectionError('timeout', 'No time left before the maximum wait elapses');
    }
    return Math.min(this.probeTimeoutMs, remaining);
  }
}
