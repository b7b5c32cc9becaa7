import { formatDifference } from "@datacheck/engine";

import type { CheckResult, SuiteReport } from "../suite/types.js";

function formatResult(result: CheckResult): string[] {
  switch (result.status) {
    case "passed":
      return [`PASS ${result.id}`];
    case "failed":
      return [
        `FAIL ${result.id}: ${result.failure.summary()}`,
        ...result.failure.differences.map((d) => `  - ${formatDifference(d)}`),
      ];
    case "error":
      return [`ERROR ${result.id}: ${result.error}`];
  }
}

/** Format a suite report as a human-friendly plain-text summary. */
export function formatPrettyReport(report: SuiteReport): string {
  const passed = report.results.filter((r) => r.status === "passed").length;
  const failed = report.results.filter((r) => r.status === "failed").length;
  const errored = report.results.filter((r) => r.status === "error").length;

  const lines: string[] = [];
  lines.push(report.name ? `Suite: ${report.name}` : "Suite");
  lines.push(`suitePath: ${report.sourcePath}`);
  lines.push("");

  for (const result of report.results) {
    lines.push(...formatResult(result));
  }

  lines.push("");
  lines.push(`${passed} passed, ${failed} failed, ${errored} errored`);
  return lines.join("\n");
}
