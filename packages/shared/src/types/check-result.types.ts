import type { DependencyKind } from '../constants/dependency-kinds';
import type { ErrorCode } from '../constants/error-codes';

export interface CheckError {
  code: ErrorCode;
  message: string;
}

export interface CheckResult {
  name: string;
  kind: DependencyKind;
  required: boolean;
  ok: boolean;
  latencyMs: number;
  checkedAt: string;
  /** Host and port that answered, on success. */
  endpoint?: string;
  error?: CheckError;
  missingKeys?: string[];
  /** Optional config-store keys that were absent on a passing config-store check. */
  missingOptionalKeys?: string[];
}
