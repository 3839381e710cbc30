import { ReadinessState } from '@readiness-gate/shared';

export interface WaitLoopContext {
  allRequiredReady: boolean;
  elapsedMs: number;
  maxWaitMs: number;
}

export class WaitLoopStateMachine {
  // Order matters: a poll that succeeds at the deadline still counts as ready.
  private static readonly TRANSITIONS: Record<
    ReadinessState,
    { target: ReadinessState; guard: (ctx: WaitLoopContext) => boolean }[]
  > = {
    [ReadinessState.POLLING]: [
      {
        target: ReadinessState.ALL_READY,
        guard: (ctx) => ctx.allRequiredReady,
      },
      {
        target: ReadinessState.TIMED_OUT,
        guard: (ctx) => ctx.elapsedMs >= ctx.maxWaitMs,
      },
    ],
    [ReadinessState.ALL_READY]: [],
    [ReadinessState.TIMED_OUT]: [],
  };

  static getNextState(current: ReadinessState, ctx: WaitLoopContext): ReadinessState | null {
    const allowed = this.TRANSITIONS[current];
    const transition = allowed.find((t) => t.guard(ctx));
    return transition?.target ?? null;
  }
}
