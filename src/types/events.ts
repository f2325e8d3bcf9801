/**
 * @module types/events
 * @description Lifecycle event catalog for signal monitors.
 *
 * Every signal owns a monitor that reports registry changes and dispatch
 * outcomes. Events are delivered synchronously, after the change they
 * describe has been applied.
 */

import type { SlotId, Timestamp } from "./branded.js";
import type { SignalError } from "../interfaces/signal.js";

// ─── Registry Events ────────────────────────────────────────────────

/** Emitted when `add()` or `addOnce()` registers a slot. */
export interface SlotAddedEvent {
  readonly type: "SLOT_ADDED";
  readonly slotId: SlotId;
  readonly once: boolean;
  readonly priority: number;
  readonly listenerCount: number;
  readonly timestamp: Timestamp;
}

/** Emitted when a slot leaves the registry (explicit or one-shot removal). */
export interface SlotRemovedEvent {
  readonly type: "SLOT_REMOVED";
  readonly slotId: SlotId;
  readonly listenerCount: number;
  readonly timestamp: Timestamp;
}

/** Emitted by `removeAll()`. */
export interface SlotsClearedEvent {
  readonly type: "SLOTS_CLEARED";
  readonly removed: number;
  readonly timestamp: Timestamp;
}

// ─── Dispatch Events ────────────────────────────────────────────────

/** Emitted when a dispatch pass completes without a listener throwing. */
export interface DispatchedEvent {
  readonly type: "DISPATCHED";
  readonly argCount: number;
  /** Size of the snapshot the pass iterated. */
  readonly visited: number;
  /** Slots whose listener actually ran. */
  readonly invoked: number;
  readonly timestamp: Timestamp;
}

/** Emitted when argument validation rejects a dispatch. */
export interface DispatchRejectedEvent {
  readonly type: "DISPATCH_REJECTED";
  readonly error: SignalError;
  readonly timestamp: Timestamp;
}

// ─── Union Types ────────────────────────────────────────────────────

export type SignalEvent =
  | SlotAddedEvent
  | SlotRemovedEvent
  | SlotsClearedEvent
  | DispatchedEvent
  | DispatchRejectedEvent;

/**
 * Extract the event type string literal from a SignalEvent.
 */
export type SignalEventType = SignalEvent["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type SignalEventMap = {
  SLOT_ADDED: SlotAddedEvent;
  SLOT_REMOVED: SlotRemovedEvent;
  SLOTS_CLEARED: SlotsClearedEvent;
  DISPATCHED: DispatchedEvent;
  DISPATCH_REJECTED: DispatchRejectedEvent;
};
