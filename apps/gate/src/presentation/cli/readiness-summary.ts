import { ErrorCode, ReadinessSummary, UnmetDependency, WaitOutcome } from '@readiness-gate/shared';

export function summarize(outcome: WaitOutcome): ReadinessSummary {
  const unmet = outcome.unmet.map(
    (result): UnmetDependency => ({
      name: result.name,
      kind: result.kind,
      code: result.error?.code ?? ErrorCode.CONNECTION_UNREACHABLE,
      message: result.error?.message ?? 'not ready',
      missingKeys: result.missingKeys,
    }),
  );
  return {
    state: outcome.state,
    iterations: outcome.iterations,
    elapsedMs: outcome.elapsedMs,
    unmet,
  };
}
