/**
 * @module primitives/signal
 * @description Signal: repeatable listeners on top of OnceSignal, plus the
 * typed factories.
 */

import { OnceSignal } from "./once-signal.js";
import type { Slot } from "./slot.js";
import type { ISignal } from "../interfaces/signal.js";
import type { Listener, RegistrationOptions } from "../types/slot.js";
import type { DispatchArgs, ValueClass } from "../types/value-class.js";

/**
 * Signal: listeners run on every dispatch until removed.
 *
 * @example
 * ```ts
 * const scored = createSignal(ValueClasses.integer, ValueClasses.string);
 * scored.add((points, player) => board.update(player, points));
 * scored.addOnce(() => banner.show("First score!"));
 * scored.dispatch(3, "ada");
 * ```
 */
export class Signal<Args extends unknown[] = unknown[]>
  extends OnceSignal<Args>
  implements ISignal<Args>
{
  add(listener: Listener<Args>, options: RegistrationOptions = {}): Slot<Args> {
    return this.register(listener, false, options);
  }
}

/**
 * Creates a Signal whose dispatch signature follows the descriptors.
 */
export function createSignal<V extends ValueClass<unknown>[]>(
  ...valueClasses: V
): Signal<DispatchArgs<V>> {
  return new Signal<DispatchArgs<V>>(...valueClasses);
}

/**
 * Creates a OnceSignal whose dispatch signature follows the descriptors.
 */
export function createOnceSignal<V extends ValueClass<unknown>[]>(
  ...valueClasses: V
): OnceSignal<DispatchArgs<V>> {
  return new OnceSignal<DispatchArgs<V>>(...valueClasses);
}
