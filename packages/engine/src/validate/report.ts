import { assertNever, safeStringify } from "@datacheck/core";

import type { Difference } from "../difference/types.js";
import { ABSENT } from "../requirement/types.js";
import type { ValidationFailure } from "./failure.js";

/** Readable form of an observed or expected value. */
export function formatValue(value: unknown): string {
  if (value === ABSENT) return "ABSENT";
  return safeStringify(value);
}

function formatDelta(delta: number): string {
  return delta > 0 ? `+${delta}` : String(delta);
}

function formatLocation(d: Difference): string {
  const parts: string[] = [];
  if (d.group !== undefined) parts.push(`in group ${d.group.map((k) => safeStringify(k)).join(" / ")}`);
  if (d.index !== undefined) parts.push(`at [${d.index}]`);
  return parts.join(" ");
}

function formatHead(d: Difference): string {
  switch (d.kind) {
    case "missing":
      return `Missing(${formatValue(d.expected)})`;
    case "extra":
      return `Extra(${formatValue(d.observed)})`;
    case "invalid":
      return `Invalid(${formatValue(d.observed)}, expected ${formatValue(d.expected)})`;
    case "deviation":
      return `Deviation(${formatDelta(d.delta)}, ${formatValue(d.expected)})`;
    default:
      return assertNever(d);
  }
}

/** Render one difference, e.g. `Invalid("c", expected "b") at [1]`. */
export function formatDifference(d: Difference): string {
  const head = formatHead(d);
  const loc = formatLocation(d);
  return loc ? `${head} ${loc}` : head;
}

export function formatFailureReport(failure: ValidationFailure): string {
  const lines = [`Validation failed: ${failure.summary()}`];
  for (const d of failure.differences) {
    lines.push(`  - ${formatDifference(d)}`);
  }
  return lines.join("\n");
}

function jsonValue(value: unknown): unknown {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number" && Number.isFinite(value) && !Object.is(value, -0)) return value;
  return formatValue(value);
}

function toJsonDifference(d: Difference): Record<string, unknown> {
  const out: Record<string, unknown> = { kind: d.kind };
  if (d.group !== undefined) out.group = [...d.group];
  if (d.index !== undefined) out.index = d.index;
  switch (d.kind) {
    case "missing":
      out.expected = jsonValue(d.expected);
      break;
    case "extra":
      out.observed = jsonValue(d.observed);
      break;
    case "invalid":
      out.observed = jsonValue(d.observed);
      out.expected = jsonValue(d.expected);
      break;
    case "deviation":
      out.observed = jsonValue(d.observed);
      out.expected = jsonValue(d.expected);
      out.delta = jsonValue(d.delta);
      break;
  }
  return out;
}

/** JSON-safe form of a failure; values JSON cannot carry exactly are rendered as text. */
export function failureToJson(failure: ValidationFailure): Record<string, unknown> {
  return {
    total: failure.total,
    counts: { ...failure.counts },
    differences: failure.differences.map(toJsonDifference),
  };
}

/** Deterministic JSON rendering of a failure. */
export function formatFailureJson(failure: ValidationFailure): string {
  return JSON.stringify(failureToJson(failure), null, 2);
}
