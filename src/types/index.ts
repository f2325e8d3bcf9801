/**
 * @module types
 * @description Public type exports.
 */

export * from "./branded.js";
export * from "./value-class.js";
export * from "./slot.js";
export * from "./events.js";
