import { failureToJson } from "@datacheck/engine";

import type { CheckResult, SuiteReport } from "../suite/types.js";

function toJson(result: CheckResult): Record<string, unknown> {
  switch (result.status) {
    case "passed":
      return { id: result.id, status: result.status };
    case "failed":
      return { id: result.id, status: result.status, failure: failureToJson(result.failure) };
    case "error":
      return { id: result.id, status: result.status, error: result.error };
  }
}

/** Format a suite report as deterministic pretty-printed JSON. */
export function formatJsonReport(report: SuiteReport): string {
  return JSON.stringify(
    {
      ...(report.name !== undefined ? { name: report.name } : {}),
      suitePath: report.sourcePath,
      results: report.results.map(toJson),
    },
    null,
    2,
  );
}
