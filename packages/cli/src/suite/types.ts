import type { ToleranceOptions, ValidationFailure } from "@datacheck/engine";

/** One (data, requirement) pair, decoded and ready to validate. */
export interface SuiteCheck {
  id: string;
  observed: unknown;
  /** Raw requirement, already decoded from the DSL. */
  requirement: unknown;
  options: ToleranceOptions;
}

export interface Suite {
  /** Human-readable name. */
  name?: string;
  checks: SuiteCheck[];
  meta: {
    sourcePath: string;
  };
}

export type CheckResult =
  | { id: string; status: "passed" }
  | { id: string; status: "failed"; failure: ValidationFailure }
  | { id: string; status: "error"; error: string };

/** Report produced by running every check of a suite. */
export interface SuiteReport {
  name?: string;
  sourcePath: string;
  results: CheckResult[];
}
