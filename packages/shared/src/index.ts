// Constants
export { DependencyKind } from './constants/dependency-kinds';
export { ErrorCode } from './constants/error-codes';
export { ExitCode } from './constants/exit-codes';
export { ReadinessState } from './constants/readiness-states';

// Types
export type { CheckError, CheckResult } from './types/check-result.types';
export type {
  ReadinessSummary,
  TerminalReadinessState,
  UnmetDependency,
  WaitOutcome,
} from './types/readiness.types';
