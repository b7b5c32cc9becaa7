import { compareKeys, isGroupKey, isPlainObject, type GroupKey } from "@datacheck/core";

import { ShapeMismatchError } from "../errors.js";
import type { RequirementKind } from "../requirement/types.js";

/**
 * The canonical shapes observed data is expected to arrive in.
 *
 * - `sequence`: an array (ordered)
 * - `set`: a `Set` (unordered; iterated in insertion order)
 * - `mapping`: a `Map` or plain object of group key -> observed data
 * - `scalar`: anything else
 */
export type ObservedShape = "scalar" | "sequence" | "set" | "mapping";

export function shapeOf(value: unknown): ObservedShape {
  if (Array.isArray(value)) return "sequence";
  if (value instanceof Set) return "set";
  if (value instanceof Map || isPlainObject(value)) return "mapping";
  return "scalar";
}

/** Elements of a `sequence` or `set`, in iteration order. */
export function collectionElements(kind: RequirementKind, value: unknown): readonly unknown[] {
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return Array.from(value);
  throw new ShapeMismatchError(kind, shapeOf(value));
}

/** Group entries of a `mapping`, sorted by ascending key. */
export function groupEntries(kind: RequirementKind, value: unknown): Array<[GroupKey, unknown]> {
  let entries: Array<[GroupKey, unknown]>;

  if (value instanceof Map) {
    entries = [];
    for (const [key, group] of value) {
      if (!isGroupKey(key)) {
        throw new ShapeMismatchError(
          kind,
          "mapping",
          `group keys must be strings or numbers (got ${typeof key})`,
        );
      }
      entries.push([key, group]);
    }
  } else if (isPlainObject(value)) {
    entries = Object.entries(value);
  } else {
    throw new ShapeMismatchError(kind, shapeOf(value));
  }

  return entries.sort((a, b) => compareKeys(a[0], b[0]));
}
