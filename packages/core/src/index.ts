export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/** True for `{}` literals and `Object.create(null)` objects (not arrays, class instances, or `null`). */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  if (Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Keys that partition grouped data. */
export type GroupKey = string | number;

export function isGroupKey(value: unknown): value is GroupKey {
  return typeof value === "string" || typeof value === "number";
}

/**
* Total order over group keys: numbers before strings, numbers numerically
* (NaN last), strings by UTF-16 code unit.
*/
export function compareKeys(a: GroupKey, b: GroupKey): number {
  if (typeof a === "number" && typeof b === "number") {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function stringifyLeaf(value: unknown): string | undefined {
  switch (typeof value) {
    case "bigint":
      return `${value.toString()}n`;
    case "symbol":
      return value.description === undefined ? "Symbol()" : `Symbol(${value.description})`;
    case "function":
      return value.name ? `[Function ${value.name}]` : "[Function]";
    case "undefined":
      return "undefined";
    case "number":
      // JSON would collapse these to `null`.
      if (!Number.isFinite(value)) return String(value);
      return Object.is(value, -0) ? "-0" : undefined;
    default:
      break;
  }
  if (value instanceof RegExp) return String(value);
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? `Date(${value.toISOString()})` : "Date(Invalid)";
  }
  return undefined;
}

function stringifyObject(value: object, seen: WeakSet<object>): string {
  if (value instanceof Set) {
    return `Set(${stringify(Array.from(value), seen)})`;
  }
  if (value instanceof Map) {
    return `Map(${stringify(Array.from(value.entries()), seen)})`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => stringify(v, seen)).join(",")}]`;
  }

  try {
    return JSON.stringify(value, (_k, v: unknown) => {
      const nested = stringifyLeaf(v);
      if (nested !== undefined) return nested;
      if (v instanceof Set || v instanceof Map) return stringify(v, seen);
      return v;
    }) ?? Object.prototype.toString.call(value);
  } catch {
    // Cyclic plain objects, throwing `toJSON`.
    return Object.prototype.toString.call(value);
  }
}

function stringify(value: unknown, seen: WeakSet<object>): string {
  const leaf = stringifyLeaf(value);
  if (leaf !== undefined) return leaf;

  if (typeof value !== "object" || value === null) {
    return JSON.stringify(value);
  }

  if (seen.has(value)) return "[Circular]";
  seen.add(value);
  try {
    return stringifyObject(value, seen);
  } finally {
    seen.delete(value);
  }
}

/**
* Render any value as compact, JSON-like text without throwing.
*
* `bigint`, `Symbol`, functions, `RegExp`, `Date`, `Set` and `Map` get
* readable forms instead of the lossy `JSON.stringify` defaults. A container
* that contains itself renders the repeat as `[Circular]`.
*/
export function safeStringify(value: unknown): string {
  return stringify(value, new WeakSet());
}
