import { compareKeys, isGroupKey, isPlainObject, type GroupKey } from "@datacheck/core";

import { MalformedRequirementError } from "../errors.js";
import { Approx } from "./approx.js";
import { isLiteralAtom, matcherFor } from "./matcher.js";
import type {
  ApproximateRequirement,
  MappingRequirement,
  Requirement,
  SequenceRequirement,
  SetRequirement,
  ToleranceOptions,
} from "./types.js";

const requirementBrand = new WeakSet<object>();

/** True only for trees returned by {@link normalize}. */
export function isRequirement(value: unknown): value is Requirement {
  return typeof value === "object" && value !== null && requirementBrand.has(value);
}

type Defaults = {
  tolerance: number;
  percent: number;
};

type Context = {
  defaults: Defaults;
  /** Containers on the current path, for cycle detection. */
  ancestors: Set<object>;
};

function joinPath(base: string, key: GroupKey): string {
  if (typeof key === "number") return `${base}[${key}]`;
  return `${base}.${key}`;
}

function freeze<T extends Requirement>(node: T): T {
  Object.freeze(node);
  requirementBrand.add(node);
  return node;
}

function checkTolerance(value: number, label: string, path: string): number {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new MalformedRequirementError(path, `${label} must be a number (got ${String(value)})`);
  }
  if (value < 0) {
    throw new MalformedRequirementError(path, `${label} must not be negative (got ${value})`);
  }
  return value;
}

function isPrimitive(value: unknown): boolean {
  return (typeof value !== "object" || value === null) && typeof value !== "function";
}

function isThenable(value: unknown): boolean {
  if (typeof value !== "object" || value === null) return false;
  return typeof Reflect.get(value, "then") === "function";
}

function normalizeApprox(raw: Approx, path: string): ApproximateRequirement {
  if (typeof raw.expected !== "number" || !Number.isFinite(raw.expected)) {
    throw new MalformedRequirementError(
      path,
      `approximate requirement needs a finite number (got ${String(raw.expected)})`,
    );
  }
  return freeze({
    kind: "approximate",
    expected: raw.expected,
    tolerance: checkTolerance(raw.tolerance, "tolerance", path),
    percent: checkTolerance(raw.percent, "percent", path),
    source: raw,
  });
}

function enter<T>(container: object, path: string, ctx: Context, build: () => T): T {
  if (ctx.ancestors.has(container)) {
    throw new MalformedRequirementError(path, "requirement contains a cycle");
  }
  ctx.ancestors.add(container);
  try {
    return build();
  } finally {
    ctx.ancestors.delete(container);
  }
}

function normalizeSet(raw: Set<unknown>, path: string, ctx: Context): SetRequirement {
  return enter(raw, path, ctx, () => {
    const members = Array.from(raw, (member, i) => normalizeAt(member, `${path}{${i}}`, ctx));
    const literalOnly = members.every((m) => m.kind === "equality" && isPrimitive(m.value));
    return freeze({ kind: "set", members: Object.freeze(members), literalOnly, source: raw });
  });
}

function normalizeSequence(raw: readonly unknown[], path: string, ctx: Context): SequenceRequirement {
  return enter(raw, path, ctx, () => {
    const items = raw.map((item, i) => normalizeAt(item, joinPath(path, i), ctx));
    return freeze({ kind: "sequence", items: Object.freeze(items), source: raw });
  });
}

function mappingEntries(raw: Map<unknown, unknown> | Record<string, unknown>, path: string): Array<[GroupKey, unknown]> {
  if (!(raw instanceof Map)) return Object.entries(raw);

  const entries: Array<[GroupKey, unknown]> = [];
  for (const [key, value] of raw) {
    if (!isGroupKey(key)) {
      throw new MalformedRequirementError(
        path,
        `mapping keys must be strings or numbers (got ${typeof key})`,
      );
    }
    entries.push([key, value]);
  }
  return entries;
}

function normalizeMapping(
  raw: Map<unknown, unknown> | Record<string, unknown>,
  path: string,
  ctx: Context,
): MappingRequirement {
  return enter(raw, path, ctx, () => {
    const entries = mappingEntries(raw, path)
      .map(([key, value]): readonly [GroupKey, Requirement] =>
        Object.freeze([key, normalizeAt(value, joinPath(path, key), ctx)] as const),
      )
      .sort((a, b) => compareKeys(a[0], b[0]));
    return freeze({ kind: "mapping", entries: Object.freeze(entries), source: raw });
  });
}

function normalizeAt(raw: unknown, path: string, ctx: Context): Requirement {
  if (isRequirement(raw)) return raw;

  if (raw instanceof Set) return normalizeSet(raw, path, ctx);
  if (Array.isArray(raw)) return normalizeSequence(raw, path, ctx);
  if (raw instanceof Map || isPlainObject(raw)) return normalizeMapping(raw, path, ctx);
  if (raw instanceof Approx) return normalizeApprox(raw, path);

  if (raw instanceof WeakMap || raw instanceof WeakSet || isThenable(raw)) {
    throw new MalformedRequirementError(path, "value cannot be used as a requirement");
  }

  const { tolerance, percent } = ctx.defaults;
  if (typeof raw === "number" && Number.isFinite(raw) && (tolerance > 0 || percent > 0)) {
    return freeze({ kind: "approximate", expected: raw, tolerance, percent, source: raw });
  }

  const matcher = matcherFor(raw);
  if (isLiteralAtom(raw)) {
    return freeze({ kind: "equality", value: raw, matcher, source: raw });
  }
  return freeze({ kind: "predicate", matcher, source: raw });
}

/**
 * Convert a raw requirement into an immutable {@link Requirement} tree.
 *
 * `Set` -> `set`, arrays -> `sequence`, `Map`/plain objects -> `mapping`,
 * {@link approx} -> `approximate`, everything else -> `equality` or
 * `predicate`. With a positive default `tolerance` or `percent`, finite
 * number literals become `approximate` too.
 *
 * Already-normalized trees are returned unchanged, so callers can cache them.
 *
 * @throws {MalformedRequirementError} if any part of `raw` cannot be normalized.
 */
export function normalize(raw: unknown, options: ToleranceOptions = {}): Requirement {
  const defaults: Defaults = {
    tolerance: checkTolerance(options.tolerance ?? 0, "default tolerance", "$"),
    percent: checkTolerance(options.percent ?? 0, "default percent", "$"),
  };
  return normalizeAt(raw, "$", { defaults, ancestors: new Set() });
}
