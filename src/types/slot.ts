/**
 * @module types/slot
 * @description Listener and registration types.
 */

/**
 * A listener receives the dispatch arguments followed by the slot's bound
 * params.
 */
export type Listener<Args extends unknown[] = unknown[]> = (
  ...args: [...Args, ...unknown[]]
) => void;

/**
 * Options accepted by `add()` and `addOnce()`.
 */
export interface RegistrationOptions {
  /**
   * Stored on the slot and reported in lifecycle events. Dispatch order
   * is always registration order. Default: 0
   */
  priority?: number;
}

/**
 * Options accepted by the Slot constructor.
 */
export interface SlotOptions extends RegistrationOptions {
  /** Remove the slot before its first invocation. Default: false */
  once?: boolean;
}
