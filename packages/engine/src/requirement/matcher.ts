import { safeStringify } from "@datacheck/core";

import { invalid, isDifference, type Difference } from "../difference/types.js";
import { MalformedRequirementError } from "../errors.js";
import { ABSENT, type Matcher } from "./types.js";

type Predicate = (observed: unknown) => unknown;
type Constructor = abstract new (...args: never[]) => unknown;

/** Explicit type descriptor, for functions that would otherwise be taken as predicates. */
export class TypeDescriptor {
  readonly ctor: Constructor;

  constructor(ctor: Constructor) {
    this.ctor = ctor;
    Object.freeze(this);
  }
}

/** Require observed values to be instances of `ctor` (or of its primitive type, for `String` etc). */
export function isType(ctor: Constructor): TypeDescriptor {
  return new TypeDescriptor(ctor);
}

const PRIMITIVE_TYPES = new Map<unknown, string>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [BigInt, "bigint"],
  [Symbol, "symbol"],
]);

const BUILTIN_CLASSES = new Set<unknown>([Date, RegExp, Error, Map, Set]);

function isCallable(value: unknown): value is Predicate {
  return typeof value === "function";
}

function isConstructorLike(value: unknown): value is Constructor {
  if (typeof value !== "function") return false;
  if (PRIMITIVE_TYPES.has(value) || BUILTIN_CLASSES.has(value)) return true;
  return Function.prototype.toString.call(value).startsWith("class");
}

function createMatcher(source: unknown, description: string, test: (observed: unknown) => boolean): Matcher {
  return Object.freeze({
    source,
    matches: test,
    describe: () => description,
    check: (observed: unknown): Difference | null => (test(observed) ? null : invalid(observed, source)),
  });
}

function literalMatcher(value: unknown): Matcher {
  if (value instanceof Date) {
    const time = value.getTime();
    return createMatcher(
      value,
      safeStringify(value),
      (observed) => observed instanceof Date && observed.getTime() === time,
    );
  }
  // `===` keeps NaN unequal to itself and ABSENT unequal to null/0/"".
  const description = value === ABSENT ? "ABSENT" : safeStringify(value);
  return createMatcher(value, description, (observed) => observed === value);
}

function regexMatcher(pattern: RegExp): Matcher {
  // `m` would let the anchors match at line breaks; `g`/`y` make `test` stateful.
  const anchored = new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gmy]/g, ""));
  return createMatcher(pattern, safeStringify(pattern), (observed) => {
    if (typeof observed === "symbol") return false;
    try {
      return anchored.test(String(observed));
    } catch {
      // Objects without a usable toString cannot match a pattern.
      return false;
    }
  });
}

function typeMatcher(source: unknown, ctor: Constructor): Matcher {
  const description = `type ${ctor.name || "anonymous"}`;
  const primitive = PRIMITIVE_TYPES.get(ctor);
  if (primitive !== undefined) {
    return createMatcher(source, description, (observed) => {
      if (typeof observed === "number" && Number.isNaN(observed)) return false;
      return typeof observed === primitive;
    });
  }
  return createMatcher(source, description, (observed) => observed instanceof ctor);
}

function predicateMatcher(fn: Predicate): Matcher {
  const name = fn.name || "anonymous";

  const check = (observed: unknown): Difference | null => {
    let result: unknown;
    try {
      result = fn(observed);
    } catch {
      // A throwing test counts as a failed match.
      return invalid(observed, fn);
    }

    if (result === true) return null;
    if (result === false) return invalid(observed, fn);
    if (isDifference(result)) return result;

    throw new MalformedRequirementError(
      `${name}()`,
      `predicate ${name} returned ${safeStringify(result)}; expected true, false or a difference`,
    );
  };

  return Object.freeze({
    source: fn,
    matches: (observed: unknown) => check(observed) === null,
    describe: () => `predicate ${name}()`,
    check,
  });
}

/** Whether `atom` builds a literal (`equality`) matcher rather than a `predicate`. */
export function isLiteralAtom(atom: unknown): boolean {
  return !(atom instanceof RegExp || atom instanceof TypeDescriptor || typeof atom === "function");
}

/**
 * Build the matcher for a requirement atom.
 *
 * Priority: user function, `RegExp` (full match on the string form), type
 * descriptor (`String`, `Date`, any `class`, or {@link isType}), literal.
 */
export function matcherFor(atom: unknown): Matcher {
  if (atom instanceof TypeDescriptor) return typeMatcher(atom, atom.ctor);
  if (isConstructorLike(atom)) return typeMatcher(atom, atom);
  if (isCallable(atom)) return predicateMatcher(atom);
  if (atom instanceof RegExp) return regexMatcher(atom);
  return literalMatcher(atom);
}
