/**
 * @module typed-signals
 * @description Typed signals and slots.
 *
 * A signal keeps an ordered list of slots (listener registrations) and
 * dispatches arguments to them, optionally checking each argument against
 * a declared value class first. Exports the signal classes and factories,
 * their interfaces and errors, the value-class table, validation helpers
 * and console tracing.
 *
 * @example
 * ```ts
 * const resized = createSignal(ValueClasses.integer, ValueClasses.integer);
 * resized.add((width, height) => layout(width, height));
 * resized.dispatch(800, 600);
 * ```
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces & Errors ────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Signals & Slots ────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Validation ─────────────────────────────────────────────────────
export * from "./validation/index.js";

// ─── Diagnostics ────────────────────────────────────────────────────
export * from "./diagnostics/index.js";
