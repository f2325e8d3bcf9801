/**
 * @module interfaces
 * @description Public interface exports.
 */

export * from "./event-emitter.js";
export * from "./slot.js";
export * from "./signal.js";
