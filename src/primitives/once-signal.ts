/**
 * @module primitives/once-signal
 * @description OnceSignal: the slot registry and dispatch engine shared by
 * every signal. On its own it only accepts one-shot listeners.
 */

import { SignalMonitor } from "./base-emitter.js";
import { Slot } from "./slot.js";
import type { IOnceSignal } from "../interfaces/signal.js";
import { SignalError } from "../interfaces/signal.js";
import type { SlotId, Timestamp } from "../types/branded.js";
import type { Listener, RegistrationOptions } from "../types/slot.js";
import type { ValueClass } from "../types/value-class.js";
import { validateArguments } from "../validation/index.js";

function now(): Timestamp {
  return Date.now() as Timestamp;
}

/**
 * OnceSignal: listeners registered here run on the next dispatch and are
 * then gone.
 *
 * @example
 * ```ts
 * const ready = new OnceSignal<[string]>(ValueClasses.string);
 * ready.addOnce((host) => connect(host));
 * ready.dispatch("db-1"); // connects
 * ready.dispatch("db-2"); // nothing left to run
 * ```
 */
export class OnceSignal<Args extends unknown[] = unknown[]>
  implements IOnceSignal<Args>
{
  readonly monitor = new SignalMonitor();

  private readonly valueClasses: readonly ValueClass<unknown>[];
  private slots: Slot<Args>[] = [];

  /**
   * @param valueClasses - One descriptor per dispatch argument. None means
   *   dispatch arguments are not validated.
   */
  constructor(...valueClasses: ValueClass<unknown>[]) {
    this.valueClasses = valueClasses;
  }

  // ─── Commands ───────────────────────────────────────────────────

  addOnce(listener: Listener<Args>, options: RegistrationOptions = {}): Slot<Args> {
    return this.register(listener, true, options);
  }

  dispatch(...args: Args): this {
    try {
      validateArguments(this.valueClasses, args);
    } catch (error) {
      if (error instanceof SignalError) {
        this.monitor.emit({ type: "DISPATCH_REJECTED", error, timestamp: now() });
      }
      throw error;
    }

    // Iterate a copy: listeners may add or remove slots mid-pass.
    const snapshot = [...this.slots];
    let invoked = 0;
    for (const slot of snapshot) {
      if (slot.execute(args)) {
        invoked += 1;
      }
    }

    this.monitor.emit({
      type: "DISPATCHED",
      argCount: args.length,
      visited: snapshot.length,
      invoked,
      timestamp: now(),
    });
    return this;
  }

  remove(id: SlotId): boolean {
    const index = this.slots.findIndex((slot) => slot.id === id);
    if (index === -1) {
      return false;
    }
    this.slots.splice(index, 1);
    this.monitor.emit({
      type: "SLOT_REMOVED",
      slotId: id,
      listenerCount: this.slots.length,
      timestamp: now(),
    });
    return true;
  }

  removeAll(): this {
    const removed = this.slots.length;
    this.slots = [];
    this.monitor.emit({ type: "SLOTS_CLEARED", removed, timestamp: now() });
    return this;
  }

  // ─── Queries ────────────────────────────────────────────────────

  getNumListeners(): number {
    return this.slots.length;
  }

  getValueClasses(): readonly ValueClass<unknown>[] {
    return this.valueClasses;
  }

  describe(): string {
    return `Signal class: ${this.constructor.name}, number of listeners: ${this.getNumListeners()}`;
  }

  toString(): string {
    return this.describe();
  }

  // ─── Internal ───────────────────────────────────────────────────

  protected register(
    listener: Listener<Args>,
    once: boolean,
    options: RegistrationOptions
  ): Slot<Args> {
    const slot = new Slot<Args>(listener, this, {
      once,
      priority: options.priority,
    });
    this.slots.push(slot);
    this.monitor.emit({
      type: "SLOT_ADDED",
      slotId: slot.id,
      once,
      priority: slot.getPriority(),
      listenerCount: this.slots.length,
      timestamp: now(),
    });
    return slot;
  }
}
