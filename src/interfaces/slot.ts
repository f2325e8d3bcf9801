/**
 * @module interfaces/slot
 * @description ISlot: one registered listener and its execution contract.
 *
 * A slot moves between two live states, Active and Disabled, through
 * `setEnabled()`. Both end in Removed, either by `remove()` or, for
 * one-shot slots, as the first step of `execute()`. Removed is terminal.
 */

import type { SlotId } from "../types/branded.js";
import type { Listener } from "../types/slot.js";

/**
 * The part of a signal a slot calls back into.
 */
export interface SlotOwner {
  /**
   * Remove the slot with this id.
   * @returns true if the owner held the slot.
   */
  remove(id: SlotId): boolean;
}

/**
 * @interface ISlot
 * @description Registration handle returned by `add()` and `addOnce()`.
 */
export interface ISlot<Args extends unknown[] = unknown[]> {
  /** Opaque identity, stable for the slot's lifetime. */
  readonly id: SlotId;

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Replaces the listener.
   * @throws {InvalidListenerError} if `listener` is not a function.
   */
  setListener(listener: Listener<Args>): this;

  /**
   * @command
   * @description Sets the params appended after the dispatch arguments on
   * every invocation.
   */
  setParams(...params: unknown[]): this;

  /**
   * @command
   * @description Enables or disables the slot. A disabled slot stays
   * registered and is skipped by dispatch.
   */
  setEnabled(enabled: boolean): this;

  /**
   * @command
   * @description Runs the listener with `args` followed by the bound params.
   *
   * A disabled slot does nothing. A one-shot slot removes itself from its
   * owner first and is skipped if the owner no longer held it.
   *
   * @returns true if the listener ran.
   */
  execute(args: Args): boolean;

  /**
   * @command
   * @description Removes the slot from its owner. Safe to call repeatedly.
   */
  remove(): this;

  // ─── Queries ────────────────────────────────────────────────────

  getListener(): Listener<Args>;
  getParams(): readonly unknown[];
  isEnabled(): boolean;
  isOnce(): boolean;

  /**
   * @query
   * @description Priority given at registration. Reported only; it does
   * not change dispatch order.
   */
  getPriority(): number;
}
