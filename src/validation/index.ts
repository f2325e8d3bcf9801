/**
 * @module validation
 * @description Runtime checks behind dispatch and registration.
 *
 * Primitive kinds use built-in predicates; nominal descriptors use
 * `instanceof`, so subclass instances match their base class.
 */

import {
  ArityMismatchError,
  InvalidListenerError,
  TypeMismatchError,
} from "../interfaces/signal.js";
import type { Listener } from "../types/slot.js";
import type { PrimitiveKind, ValueClass } from "../types/value-class.js";

// Decimal digits with an optional sign, fraction and exponent. Hex, binary
// and octal literals are not numeric strings.
const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function isNumericString(value: string): boolean {
  return NUMERIC_STRING.test(value);
}

const PRIMITIVE_PREDICATES: Record<PrimitiveKind, (value: unknown) => boolean> = {
  boolean: (value) => typeof value === "boolean",
  integer: (value) => Number.isInteger(value),
  float: (value) => typeof value === "number",
  string: (value) => typeof value === "string",
  array: (value) => Array.isArray(value),
  object: (value) =>
    typeof value === "object" && value !== null && !Array.isArray(value),
  null: (value) => value === null,
  numeric: (value) =>
    typeof value === "number" ||
    typeof value === "bigint" ||
    (typeof value === "string" && isNumericString(value)),
  scalar: (value) =>
    typeof value === "boolean" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string",
};

/**
 * Short type description of a value, as reported in TypeMismatchError.
 *
 * @example
 * ```ts
 * describeValue(3);          // "integer"
 * describeValue(3.5);        // "float"
 * describeValue([1]);        // "array"
 * describeValue(new Date()); // "Date"
 * ```
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "number":
      return Number.isInteger(value) ? "integer" : "float";
    case "object": {
      // Read the constructor from the prototype: an own `constructor`
      // property on a data object says nothing about its type.
      const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
      const name = typeof ctor === "function" ? ctor.name : "";
      return name === "" || name === "Object" ? "object" : name;
    }
    default:
      return typeof value;
  }
}

/**
 * Whether `value` satisfies the descriptor.
 */
export function matchesValueClass<T>(
  valueClass: ValueClass<T>,
  value: unknown
): value is T {
  switch (valueClass.kind) {
    case "primitive":
      return PRIMITIVE_PREDICATES[valueClass.primitive](value);
    case "nominal":
      return value instanceof valueClass.type;
  }
}

/**
 * Checks one argument against its descriptor.
 *
 * @param index - Argument position, reported in the error.
 * @throws {TypeMismatchError} when the value does not match.
 */
export function validateValueClass<T>(
  valueClass: ValueClass<T>,
  value: unknown,
  index = 0
): true {
  if (!matchesValueClass(valueClass, value)) {
    throw new TypeMismatchError(valueClass.name, describeValue(value), index);
  }
  return true;
}

/**
 * Checks a full dispatch argument list. An empty descriptor list accepts
 * anything. Otherwise the count must match and every argument must pass,
 * checked left to right; the first failure throws.
 *
 * @throws {ArityMismatchError} on a count mismatch, before any value check.
 * @throws {TypeMismatchError} for the first failing argument.
 */
export function validateArguments(
  valueClasses: readonly ValueClass<unknown>[],
  args: readonly unknown[]
): void {
  if (valueClasses.length === 0) return;
  if (args.length !== valueClasses.length) {
    throw new ArityMismatchError(valueClasses.length, args.length);
  }
  valueClasses.forEach((valueClass, index) => {
    validateValueClass(valueClass, args[index], index);
  });
}

/**
 * Registration-time guard for listeners arriving from untyped callers.
 *
 * @throws {InvalidListenerError} when `value` is not a function.
 */
export function assertListener(value: unknown): asserts value is Listener {
  if (typeof value !== "function") {
    throw new InvalidListenerError(describeValue(value));
  }
}
