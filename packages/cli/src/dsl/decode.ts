import { isPlainObject, safeStringify } from "@datacheck/core";
import { ABSENT, approx } from "@datacheck/engine";

import { SuiteError } from "../util/errors.js";

const TYPE_NAMES = new Map<string, unknown>([
  ["string", String],
  ["number", Number],
  ["boolean", Boolean],
  ["bigint", BigInt],
]);

/** Directive -> keys it accepts besides itself. */
const DIRECTIVES = new Map<string, readonly string[]>([
  ["$set", []],
  ["$regex", ["flags"]],
  ["$approx", ["tolerance", "percent"]],
  ["$type", []],
  ["$absent", []],
]);

function joinPath(base: string, key: string | number): string {
  if (typeof key === "number") return `${base}[${key}]`;
  return `${base}.${key}`;
}

function optionalNumber(obj: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new SuiteError(`${joinPath(path, key)} must be a number (got ${safeStringify(value)})`);
  }
  return value;
}

function decodeDirective(directive: string, obj: Record<string, unknown>, path: string): unknown {
  const arg = obj[directive];
  const at = joinPath(path, directive);

  switch (directive) {
    case "$set": {
      if (!Array.isArray(arg)) {
        throw new SuiteError(`${at} must be an array (got ${safeStringify(arg)})`);
      }
      return new Set(arg.map((item, i) => decodeRequirement(item, joinPath(at, i))));
    }
    case "$regex": {
      const flags = obj.flags ?? "";
      if (typeof arg !== "string" || typeof flags !== "string") {
        throw new SuiteError(`${at} must be a pattern string with optional string flags`);
      }
      try {
        return new RegExp(arg, flags);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new SuiteError(`${at} is not a valid regular expression: ${msg}`);
      }
    }
    case "$approx": {
      if (typeof arg !== "number") {
        throw new SuiteError(`${at} must be a number (got ${safeStringify(arg)})`);
      }
      const tolerance = optionalNumber(obj, "tolerance", path);
      const percent = optionalNumber(obj, "percent", path);
      return approx(arg, {
        ...(tolerance !== undefined ? { tolerance } : {}),
        ...(percent !== undefined ? { percent } : {}),
      });
    }
    case "$type": {
      const ctor = typeof arg === "string" ? TYPE_NAMES.get(arg) : undefined;
      if (ctor === undefined) {
        throw new SuiteError(
          `${at} must be one of: ${Array.from(TYPE_NAMES.keys()).join(", ")} (got ${safeStringify(arg)})`,
        );
      }
      return ctor;
    }
    case "$absent": {
      if (arg !== true) {
        throw new SuiteError(`${at} must be true (got ${safeStringify(arg)})`);
      }
      return ABSENT;
    }
    default:
      throw new SuiteError(`${at}: unknown directive`);
  }
}

/**
 * Decode a requirement written in YAML/JSON into the raw form `normalize`
 * accepts.
 *
 * Objects with a single `$`-directive key become sets, patterns, tolerances,
 * types or the absence marker; other objects are mappings, arrays are
 * sequences, and scalars are literals.
 */
export function decodeRequirement(raw: unknown, path = "require"): unknown {
  if (Array.isArray(raw)) {
    return raw.map((item, i) => decodeRequirement(item, joinPath(path, i)));
  }

  if (!isPlainObject(raw)) return raw;

  const keys = Object.keys(raw);
  const directives = keys.filter((k) => k.startsWith("$"));

  if (directives.length === 0) {
    const out: Record<string, unknown> = {};
    for (const key of keys) {
      out[key] = decodeRequirement(raw[key], joinPath(path, key));
    }
    return out;
  }

  const [directive, ...others] = directives;
  if (directive === undefined || others.length > 0) {
    throw new SuiteError(`${path} mixes directives: ${directives.join(", ")}`);
  }

  const allowed = DIRECTIVES.get(directive);
  if (allowed === undefined) {
    throw new SuiteError(`${joinPath(path, directive)}: unknown directive (known: ${Array.from(DIRECTIVES.keys()).join(", ")})`);
  }
  const stray = keys.filter((k) => k !== directive && !allowed.includes(k));
  if (stray.length > 0) {
    throw new SuiteError(`${path}: ${directive} does not accept key(s): ${stray.join(", ")}`);
  }

  return decodeDirective(directive, raw, path);
}
