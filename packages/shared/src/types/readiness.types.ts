import type { ReadinessState } from '../constants/readiness-states';
import type { CheckResult } from './check-result.types';

export type TerminalReadinessState = Exclude<ReadinessState, ReadinessState.POLLING>;

export interface WaitOutcome {
  state: TerminalReadinessState;
  iterations: number;
  elapsedMs: number;
  results: CheckResult[];
  unmet: CheckResult[];
}

export interface UnmetDependency {
  name: string;
  kind: string;
  code: string;
  message: string;
  missingKeys?: string[];
}

export interface ReadinessSummary {
  state: TerminalReadinessState;
  iterations: number;
  elapsedMs: number;
  unmet: UnmetDependency[];
}
