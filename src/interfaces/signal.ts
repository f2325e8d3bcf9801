/**
 * @module interfaces/signal
 * @description IOnceSignal and ISignal: slot registry and dispatch.
 *
 * Dispatch is validate-then-execute: arguments are checked against the
 * declared value classes before any listener runs, then every enabled slot
 * of a snapshot of the registry is executed in registration order. Slots
 * added or removed by listeners do not change the current pass.
 */

import type { SlotId } from "../types/branded.js";
import type { Listener, RegistrationOptions } from "../types/slot.js";
import type { ValueClass } from "../types/value-class.js";
import type { ISignalMonitor } from "./event-emitter.js";
import type { ISlot } from "./slot.js";

export type SignalErrorCode =
  | "INVALID_LISTENER"
  | "ARITY_MISMATCH"
  | "TYPE_MISMATCH";

/**
 * Errors that may be thrown by signal and slot operations.
 */
export class SignalError extends Error {
  constructor(
    message: string,
    public readonly code: SignalErrorCode
  ) {
    super(message);
    this.name = "SignalError";
  }
}

/**
 * Thrown at registration when the listener is not callable.
 */
export class InvalidListenerError extends SignalError {
  constructor(public readonly received: string) {
    super(
      `Invalid listener: expected a function, received ${received}`,
      "INVALID_LISTENER"
    );
    this.name = "InvalidListenerError";
  }
}

/**
 * Thrown by dispatch when the argument count differs from the declared
 * value-class count.
 */
export class ArityMismatchError extends SignalError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(
      `Value class mismatch: expected ${expected} arguments, received ${actual}`,
      "ARITY_MISMATCH"
    );
    this.name = "ArityMismatchError";
  }
}

/**
 * Thrown by dispatch when an argument fails its positional value class.
 */
export class TypeMismatchError extends SignalError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    public readonly index: number
  ) {
    super(
      `Argument ${index} does not match value class: expected ${expected}, received ${actual}`,
      "TYPE_MISMATCH"
    );
    this.name = "TypeMismatchError";
  }
}

/**
 * @interface IOnceSignal
 * @description A signal whose listeners run at most once each.
 */
export interface IOnceSignal<Args extends unknown[] = unknown[]> {
  /** Lifecycle events for this signal. */
  readonly monitor: ISignalMonitor;

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Registers a listener that is removed before its first
   * invocation.
   * @throws {InvalidListenerError} if `listener` is not a function.
   */
  addOnce(listener: Listener<Args>, options?: RegistrationOptions): ISlot<Args>;

  /**
   * @command
   * @description Validates `args`, then executes a snapshot of the
   * registry in registration order.
   *
   * @throws {ArityMismatchError} when value classes are declared and the
   *   argument count differs. No listener runs.
   * @throws {TypeMismatchError} for the first argument that fails its value
   *   class. No listener runs.
   * @returns this, for chaining.
   */
  dispatch(...args: Args): this;

  /**
   * @command
   * @description Removes the slot with this id. Absent ids are ignored.
   * @returns true if a slot was removed.
   */
  remove(id: SlotId): boolean;

  /**
   * @command
   * @description Clears the registry.
   */
  removeAll(): this;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Registered slots, disabled ones included.
   */
  getNumListeners(): number;

  getValueClasses(): readonly ValueClass<unknown>[];

  /**
   * @query
   * @description Diagnostic summary of the concrete class and listener count.
   */
  describe(): string;
}

/**
 * @interface ISignal
 * @description A signal that supports repeatable listeners.
 */
export interface ISignal<Args extends unknown[] = unknown[]>
  extends IOnceSignal<Args> {
  /**
   * @command
   * @description Registers a listener that runs on every dispatch until
   * removed.
   * @throws {InvalidListenerError} if `listener` is not a function.
   */
  add(listener: Listener<Args>, options?: RegistrationOptions): ISlot<Args>;
}
