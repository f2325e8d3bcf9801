/**
 * @module primitives/slot
 * @description Slot: one listener registration on a signal.
 */

import type { ISlot, SlotOwner } from "../interfaces/slot.js";
import type { SlotId } from "../types/branded.js";
import type { Listener, SlotOptions } from "../types/slot.js";
import { assertListener } from "../validation/index.js";

let slotSequence = 0;

function nextSlotId(): SlotId {
  slotSequence += 1;
  return `slot-${slotSequence}` as SlotId;
}

/**
 * Slot: a listener, its bound params and its execution flags.
 *
 * The owner is held through a WeakRef: a slot handle kept by application
 * code never keeps its signal alive. Once the signal is collected,
 * `remove()` does nothing and one-shot slots no longer run.
 *
 * @example
 * ```ts
 * const slot = signal.add((score, bonus) => console.log(score, bonus));
 * slot.setParams("x2");
 * signal.dispatch(10); // logs 10 "x2"
 * slot.setEnabled(false);
 * signal.dispatch(11); // nothing
 * ```
 */
export class Slot<Args extends unknown[] = unknown[]> implements ISlot<Args> {
  readonly id: SlotId = nextSlotId();

  private listener: Listener<Args>;
  private params: readonly unknown[] = [];
  private enabled = true;
  private readonly once: boolean;
  private readonly priority: number;
  private readonly owner: WeakRef<SlotOwner>;

  constructor(listener: Listener<Args>, owner: SlotOwner, options: SlotOptions = {}) {
    assertListener(listener);
    this.listener = listener;
    this.owner = new WeakRef(owner);
    this.once = options.once ?? false;
    this.priority = options.priority ?? 0;
  }

  // ─── Commands ───────────────────────────────────────────────────

  setListener(listener: Listener<Args>): this {
    assertListener(listener);
    this.listener = listener;
    return this;
  }

  setParams(...params: unknown[]): this {
    this.params = params;
    return this;
  }

  setEnabled(enabled: boolean): this {
    this.enabled = enabled;
    return this;
  }

  execute(args: Args): boolean {
    if (!this.enabled) {
      return false;
    }
    // Detach before invoking so a reentrant dispatch cannot run this slot
    // again; a false return means another pass already consumed it.
    if (this.once && !this.detach()) {
      return false;
    }
    this.listener(...args, ...this.params);
    return true;
  }

  remove(): this {
    this.detach();
    return this;
  }

  // ─── Queries ────────────────────────────────────────────────────

  getListener(): Listener<Args> {
    return this.listener;
  }

  getParams(): readonly unknown[] {
    return this.params;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isOnce(): boolean {
    return this.once;
  }

  getPriority(): number {
    return this.priority;
  }

  private detach(): boolean {
    const owner = this.owner.deref();
    return owner !== undefined && owner.remove(this.id);
  }
}
