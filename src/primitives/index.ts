/**
 * @module primitives
 * @description Slot, the two signal classes and the lifecycle monitor.
 */

export { SignalMonitor } from "./base-emitter.js";
export { Slot } from "./slot.js";
export { OnceSignal } from "./once-signal.js";
export { Signal, createSignal, createOnceSignal } from "./signal.js";
