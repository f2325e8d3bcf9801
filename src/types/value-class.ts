/**
 * @module types/value-class
 * @description Value-class descriptors: the declared type of each positional
 * dispatch argument.
 *
 * A descriptor is either a primitive kind, checked with a built-in
 * predicate, or a nominal type, checked with `instanceof`. Each descriptor
 * carries the TypeScript type a matching value has, so a signal built from
 * descriptors knows its dispatch signature.
 *
 * @example
 * ```ts
 * const moved = createSignal(ValueClasses.integer, ValueClasses.instanceOf(Date));
 * moved.dispatch(3, new Date()); // ok
 * moved.dispatch("3", new Date()); // compile error, and TypeMismatchError at runtime
 * ```
 */

/** Phantom key carrying the matched value type. Not exported. */
declare const __valueType: unique symbol;

/**
 * Built-in value kinds.
 *
 * | Kind    | Accepts                                                   |
 * |---------|-----------------------------------------------------------|
 * | boolean | `true` / `false`                                          |
 * | integer | a `number` with no fractional part                        |
 * | float   | any `number`                                              |
 * | string  | any string                                                |
 * | array   | `Array.isArray`                                           |
 * | object  | non-null, non-array objects                               |
 * | null    | `null` only                                               |
 * | numeric | `number`, `bigint`, or a decimal string (`"-1.5e3"`)       |
 * | scalar  | boolean, number, bigint or string                         |
 */
export type PrimitiveKind =
  | "boolean"
  | "integer"
  | "float"
  | "string"
  | "array"
  | "object"
  | "null"
  | "numeric"
  | "scalar";

/**
 * Any class, abstract or concrete, whatever its constructor parameters.
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

interface ValueClassBase<T> {
  /** Human-readable descriptor name, used in error messages. */
  readonly name: string;
  readonly [__valueType]?: T;
}

export interface PrimitiveValueClass<T> extends ValueClassBase<T> {
  readonly kind: "primitive";
  readonly primitive: PrimitiveKind;
}

export interface NominalValueClass<T> extends ValueClassBase<T> {
  readonly kind: "nominal";
  readonly type: Constructor<T>;
}

/**
 * A declared type constraint on one positional dispatch argument.
 */
export type ValueClass<T> = PrimitiveValueClass<T> | NominalValueClass<T>;

/**
 * The value type a descriptor matches.
 */
export type ValueType<C> = C extends ValueClass<infer T> ? T : never;

/**
 * Dispatch arguments for a descriptor list. An empty list declares no
 * validation, so any arguments are accepted.
 */
export type DispatchArgs<V extends ValueClass<unknown>[]> = V extends []
  ? unknown[]
  : Extract<{ [K in keyof V]: ValueType<V[K]> }, unknown[]>;

function primitive<T>(kind: PrimitiveKind): PrimitiveValueClass<T> {
  return { kind: "primitive", primitive: kind, name: kind };
}

/**
 * Descriptor table. Primitive kinds are shared singletons; nominal
 * descriptors are built with {@link ValueClasses.instanceOf}.
 */
export const ValueClasses = {
  boolean: primitive<boolean>("boolean"),
  integer: primitive<number>("integer"),
  float: primitive<number>("float"),
  string: primitive<string>("string"),
  array: primitive<unknown[]>("array"),
  object: primitive<object>("object"),
  null: primitive<null>("null"),
  numeric: primitive<number | bigint | string>("numeric"),
  scalar: primitive<boolean | number | bigint | string>("scalar"),

  /**
   * Matches instances of `type`, subclasses included.
   */
  instanceOf<T>(type: Constructor<T>): NominalValueClass<T> {
    return { kind: "nominal", type, name: type.name || "anonymous class" };
  },
};
