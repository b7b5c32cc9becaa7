import type { GroupKey } from "@datacheck/core";

import type { Difference } from "../difference/types.js";

/**
 * Uniform boolean test built once from a requirement atom (literal, regex,
 * type, or user function).
 */
export interface Matcher {
  /** The raw atom this matcher was built from. */
  readonly source: unknown;

  matches(observed: unknown): boolean;

  /** Short human-readable form, e.g. `/a+/`, `type Date`, `predicate isEven()`. */
  describe(): string;

  /** The difference to report for `observed`, or `null` on a match. */
  check(observed: unknown): Difference | null;
}

export type EqualityRequirement = {
  readonly kind: "equality";
  readonly value: unknown;
  readonly matcher: Matcher;
  readonly source: unknown;
};

export type PredicateRequirement = {
  readonly kind: "predicate";
  readonly matcher: Matcher;
  readonly source: unknown;
};

export type SetRequirement = {
  readonly kind: "set";
  /** Members in declared (insertion) order. */
  readonly members: readonly Requirement[];
  /** Every member is an equality on a primitive, so membership can be hashed. */
  readonly literalOnly: boolean;
  readonly source: unknown;
};

export type SequenceRequirement = {
  readonly kind: "sequence";
  readonly items: readonly Requirement[];
  readonly source: unknown;
};

export type MappingRequirement = {
  readonly kind: "mapping";
  /** Entries sorted by ascending group key. */
  readonly entries: ReadonlyArray<readonly [GroupKey, Requirement]>;
  readonly source: unknown;
};

export type ApproximateRequirement = {
  readonly kind: "approximate";
  readonly expected: number;
  /** Absolute tolerance. */
  readonly tolerance: number;
  /** Relative tolerance as a fraction of `|expected|` (0 disables it). */
  readonly percent: number;
  readonly source: unknown;
};

export type Requirement =
  | EqualityRequirement
  | PredicateRequirement
  | SetRequirement
  | SequenceRequirement
  | MappingRequirement
  | ApproximateRequirement;

export type RequirementKind = Requirement["kind"];

/** Tolerances applied when comparing numbers. */
export type ToleranceOptions = {
  /** Absolute tolerance (defaults to 0). */
  tolerance?: number;
  /** Relative tolerance as a fraction of the expected value (defaults to 0). */
  percent?: number;
};

/** Explicit marker for "no value"; only matches itself (never `null`, `0` or `""`). */
export const ABSENT: unique symbol = Symbol("datacheck.absent");
