import fs from "node:fs/promises";
import path from "node:path";

import { isPlainObject, safeStringify } from "@datacheck/core";
import type { ToleranceOptions } from "@datacheck/engine";
import YAML from "yaml";

import { decodeRequirement } from "../dsl/decode.js";
import { SuiteError } from "../util/errors.js";
import type { Suite, SuiteCheck } from "./types.js";

const SUITE_KEYS = new Set(["schemaVersion", "name", "defaults", "checks"]);
const CHECK_KEYS = new Set(["id", "data", "require", "tolerance", "percent"]);

const defaultOnWarning = (message: string): void => {
  if (typeof console !== "undefined" && typeof console.warn === "function") {
    console.warn(message);
  }
};

export interface LoadSuiteOptions {
  cwd: string;
  suitePath: string;
  /**
   * Warning hook for non-fatal suite issues (unknown keys).
   *
   * When not provided, warnings fall back to `console.warn` (if available).
   */
  onWarning?: (message: string) => void;
}

async function readText(absPath: string, label: string): Promise<string> {
  try {
    return await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;

    if (code === "ENOENT") {
      throw new SuiteError(`${label} not found: ${absPath}`);
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new SuiteError(`cannot read ${label} (permission denied): ${absPath}`);
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new SuiteError(`failed to read ${label} ${absPath}: ${msg}`);
  }
}

function parseYamlText(text: string, label: string): unknown {
  try {
    return YAML.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SuiteError(`invalid YAML in ${label}: ${msg}`);
  }
}

function readTolerances(raw: Record<string, unknown>, label: string): ToleranceOptions {
  const out: ToleranceOptions = {};
  for (const key of ["tolerance", "percent"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "number") {
      throw new SuiteError(`${label}.${key} must be a number (got ${safeStringify(value)})`);
    }
    out[key] = value;
  }
  return out;
}

function warnUnknownKeys(
  raw: Record<string, unknown>,
  known: Set<string>,
  label: string,
  onWarning: (message: string) => void,
): void {
  const unknown = Object.keys(raw).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    onWarning(`unknown key(s) in ${label}: ${unknown.sort().join(", ")} (ignoring)`);
  }
}

function parseCheck(
  raw: unknown,
  index: number,
  defaults: ToleranceOptions,
  onWarning: (message: string) => void,
): SuiteCheck {
  const label = `checks[${index}]`;
  if (!isPlainObject(raw)) {
    throw new SuiteError(`${label} must be a mapping/object (got ${safeStringify(raw)})`);
  }
  warnUnknownKeys(raw, CHECK_KEYS, label, onWarning);

  const rawId = raw.id;
  if (rawId !== undefined && typeof rawId !== "string") {
    throw new SuiteError(`${label}.id must be a string (got ${safeStringify(rawId)})`);
  }
  const id = rawId ?? `check-${index}`;

  if (!("data" in raw)) {
    throw new SuiteError(`${label}.data is required`);
  }

  if (!("require" in raw)) {
    throw new SuiteError(`${label}.require is required`);
  }

  return {
    id,
    observed: raw.data,
    requirement: decodeRequirement(raw.require, `${label}.require`),
    options: { ...defaults, ...readTolerances(raw, label) },
  };
}

/** Load a suite YAML file from disk and decode it into validated checks. */
export async function loadSuite(opts: LoadSuiteOptions): Promise<Suite> {
  const sourcePath = path.resolve(opts.cwd, opts.suitePath);
  const onWarning = opts.onWarning ?? defaultOnWarning;

  const parsed = parseYamlText(await readText(sourcePath, "suite"), opts.suitePath);

  if (!isPlainObject(parsed)) {
    throw new SuiteError("suite root must be an object");
  }
  warnUnknownKeys(parsed, SUITE_KEYS, opts.suitePath, onWarning);

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new SuiteError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const name = parsed.name;
  if (name !== undefined && typeof name !== "string") {
    throw new SuiteError(`name must be a string (got ${safeStringify(name)})`);
  }

  let defaults: ToleranceOptions = {};
  if (parsed.defaults !== undefined) {
    if (!isPlainObject(parsed.defaults)) {
      throw new SuiteError("defaults must be an object");
    }
    defaults = readTolerances(parsed.defaults, "defaults");
  }

  if (!Array.isArray(parsed.checks) || parsed.checks.length === 0) {
    throw new SuiteError("checks must be a non-empty array");
  }

  const checks = parsed.checks.map((raw, i) => parseCheck(raw, i, defaults, onWarning));

  const ids = new Set<string>();
  for (const c of checks) {
    if (ids.has(c.id)) throw new SuiteError(`duplicate check id: ${c.id}`);
    ids.add(c.id);
  }

  const suite: Suite = { checks, meta: { sourcePath } };
  if (name !== undefined) suite.name = name;
  return suite;
}
