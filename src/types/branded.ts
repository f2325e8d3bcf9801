/**
 * @module types/branded
 * @description Branded types for compile-time safety across the signal API.
 *
 * Slot identifiers are plain strings at runtime. Branding them keeps an
 * arbitrary string from being passed to `remove()` where a slot id is
 * expected, and keeps raw numbers out of event timestamps.
 *
 * @example
 * ```ts
 * const raw = "slot-1";
 * // Type error: string is not assignable to SlotId
 * signal.remove(raw);
 * // Correct:
 * signal.remove(slot.id);
 * ```
 */

/** Unique symbol for branding. Not exported, internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/**
 * Opaque slot identity, unique for the lifetime of the process
 * (`slot-1`, `slot-2`, ...). Used as the removal key.
 */
export type SlotId = Brand<string, "SlotId">;

/**
 * Milliseconds since the Unix epoch.
 */
export type Timestamp = Brand<number, "Timestamp">;
