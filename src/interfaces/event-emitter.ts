/**
 * @module interfaces/event-emitter
 * @description Typed lifecycle emitter attached to every signal.
 *
 * The event map ensures that monitor listeners receive correctly-typed
 * payloads without runtime type checking.
 */

import type { SignalEventMap, SignalEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends SignalEventType> = (
  event: SignalEventMap[T]
) => void;

/**
 * @interface ISignalMonitor
 * @description Typed emitter for signal lifecycle events.
 */
export interface ISignalMonitor {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback function receiving the typed event payload.
   */
  on<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener. Unknown listeners are ignored.
   */
  off<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit<T extends SignalEventType>(event: SignalEventMap[T]): void;

  /**
   * Number of listeners registered for an event type.
   */
  listenerCount(eventType: SignalEventType): number;
}
