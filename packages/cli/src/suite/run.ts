import { MalformedRequirementError, ShapeMismatchError, validate } from "@datacheck/engine";

import { UsageError } from "../util/errors.js";
import type { CheckResult, Suite, SuiteCheck, SuiteReport } from "./types.js";

export interface RunSuiteOptions {
  /** Run only the check with this id. */
  onlyCheckId?: string;
}

function runCheck(check: SuiteCheck): CheckResult {
  try {
    const result = validate(check.observed, check.requirement, check.options);
    return result.ok
      ? { id: check.id, status: "passed" }
      : { id: check.id, status: "failed", failure: result.failure };
  } catch (err) {
    if (err instanceof MalformedRequirementError || err instanceof ShapeMismatchError) {
      return { id: check.id, status: "error", error: `${err.name}: ${err.message}` };
    }
    throw err;
  }
}

/** Validate every check of `suite`, in file order. */
export function runSuite(suite: Suite, opts: RunSuiteOptions = {}): SuiteReport {
  let checks = suite.checks;

  if (opts.onlyCheckId !== undefined) {
    const only = opts.onlyCheckId;
    checks = checks.filter((c) => c.id === only);
    if (checks.length === 0) {
      const known = suite.checks.map((c) => c.id).join(", ");
      throw new UsageError(`unknown check id: ${only} (known: ${known})`);
    }
  }

  const report: SuiteReport = {
    sourcePath: suite.meta.sourcePath,
    results: checks.map(runCheck),
  };
  if (suite.name !== undefined) report.name = suite.name;
  return report;
}

/** Process exit code for a report: 2 if any check errored, 1 if any failed, else 0. */
export function exitCodeFor(report: SuiteReport): number {
  if (report.results.some((r) => r.status === "error")) return 2;
  if (report.results.some((r) => r.status === "failed")) return 1;
  return 0;
}
