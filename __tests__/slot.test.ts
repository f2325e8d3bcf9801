import { describe, it, expect, beforeEach, vi } from "vitest";
import { Slot } from "../src/primitives/slot.js";
import { InvalidListenerError } from "../src/interfaces/signal.js";
import type { SlotOwner } from "../src/interfaces/slot.js";
import type { SlotId } from "../src/types/branded.js";

// ─── Helpers ───────────────────────────────────────────────────────

/** Owner that records removals and reports whether it still held the slot. */
class FakeOwner implements SlotOwner {
  readonly held = new Set<SlotId>();
  readonly removed: SlotId[] = [];

  remove(id: SlotId): boolean {
    this.removed.push(id);
    return this.held.delete(id);
  }
}

function register(owner: FakeOwner, slot: Slot<[string]>): Slot<[string]> {
  owner.held.add(slot.id);
  return slot;
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("Slot", () => {
  let owner: FakeOwner;

  beforeEach(() => {
    owner = new FakeOwner();
  });

  describe("constructor", () => {
    it("should start enabled, repeatable, priority 0, with no params", () => {
      const listener = vi.fn();
      const slot = new Slot<[string]>(listener, owner);
      expect(slot.isEnabled()).toBe(true);
      expect(slot.isOnce()).toBe(false);
      expect(slot.getPriority()).toBe(0);
      expect(slot.getParams()).toEqual([]);
      expect(slot.getListener()).toBe(listener);
    });

    it("should take once and priority from options", () => {
      const slot = new Slot(vi.fn(), owner, { once: true, priority: 5 });
      expect(slot.isOnce()).toBe(true);
      expect(slot.getPriority()).toBe(5);
    });

    it("should assign a distinct id to every slot", () => {
      const a = new Slot(vi.fn(), owner);
      const b = new Slot(vi.fn(), owner);
      expect(a.id).not.toBe(b.id);
      expect(a.id).toMatch(/^slot-\d+$/);
    });

    it("should throw InvalidListenerError for a non-function listener", () => {
      // Listener read from untyped input, e.g. a handler name in JSON config.
      const fromConfig = JSON.parse('"onClick"');
      expect(() => new Slot(fromConfig, owner)).toThrow(InvalidListenerError);
      expect(() => new Slot(fromConfig, owner)).toThrow(
        "Invalid listener: expected a function, received string"
      );
    });

    it("should reject a non-function passed to setListener()", () => {
      const slot = new Slot(vi.fn(), owner);
      const fromConfig = JSON.parse("{}");
      expect(() => slot.setListener(fromConfig)).toThrow(
        "Invalid listener: expected a function, received object"
      );
    });
  });

  describe("setters", () => {
    it("should return the slot for chaining", () => {
      const slot = new Slot(vi.fn(), owner);
      const next = vi.fn();
      expect(slot.setParams("a", 1)).toBe(slot);
      expect(slot.setEnabled(false)).toBe(slot);
      expect(slot.setListener(next)).toBe(slot);
      expect(slot.getParams()).toEqual(["a", 1]);
      expect(slot.isEnabled()).toBe(false);
      expect(slot.getListener()).toBe(next);
    });

    it("should return the slot when enabled is set to its current value", () => {
      const slot = new Slot(vi.fn(), owner);
      expect(slot.setEnabled(true)).toBe(slot);
      expect(slot.isEnabled()).toBe(true);
    });
  });

  describe("execute()", () => {
    it("should append bound params after the dispatch arguments", () => {
      const listener = vi.fn();
      const slot = register(owner, new Slot<[string]>(listener, owner));
      slot.setParams(42, "bound");
      expect(slot.execute(["dispatched"])).toBe(true);
      expect(listener).toHaveBeenCalledWith("dispatched", 42, "bound");
    });

    it("should do nothing while disabled", () => {
      const listener = vi.fn();
      const slot = register(owner, new Slot<[string]>(listener, owner));
      slot.setEnabled(false);
      expect(slot.execute(["x"])).toBe(false);
      expect(listener).not.toHaveBeenCalled();
      expect(owner.removed).toEqual([]);
    });

    it("should remove a one-shot slot before invoking its listener", () => {
      const order: string[] = [];
      const slot = register(
        owner,
        new Slot<[string]>(
          () => {
            order.push(owner.held.has(slot.id) ? "still-held" : "detached");
          },
          owner,
          { once: true }
        )
      );
      expect(slot.execute(["x"])).toBe(true);
      expect(order).toEqual(["detached"]);
      expect(owner.removed).toEqual([slot.id]);
    });

    it("should skip a one-shot slot its owner no longer holds", () => {
      const listener = vi.fn();
      const slot = new Slot<[string]>(listener, owner, { once: true });
      expect(slot.execute(["x"])).toBe(false);
      expect(listener).not.toHaveBeenCalled();
    });

    it("should leave a repeatable slot registered", () => {
      const slot = register(owner, new Slot<[string]>(vi.fn(), owner));
      slot.execute(["x"]);
      slot.execute(["y"]);
      expect(owner.removed).toEqual([]);
    });

    it("should propagate listener errors", () => {
      const slot = new Slot<[string]>(() => {
        throw new Error("listener failed");
      }, owner);
      expect(() => slot.execute(["x"])).toThrow("listener failed");
    });
  });

  describe("remove()", () => {
    it("should delegate to the owner and be safe to repeat", () => {
      const slot = register(owner, new Slot<[string]>(vi.fn(), owner));
      expect(slot.remove()).toBe(slot);
      slot.remove();
      expect(owner.removed).toEqual([slot.id, slot.id]);
      expect(owner.held.size).toBe(0);
    });
  });
});
