/**
 * @module primitives/base-emitter
 * @description SignalMonitor: the `monitor` a signal reports slot and
 * dispatch lifecycle events through.
 */

import type {
  ISignalMonitor,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  SignalEventMap,
  SignalEventType,
} from "../types/events.js";

/**
 * Subscribers are grouped by event type. A signal with nobody watching a
 * given event type holds no entry for it, so `listenerCount` reads 0 and
 * `emit` returns immediately.
 */
export class SignalMonitor implements ISignalMonitor {
  private readonly listeners = new Map<
    SignalEventType,
    Set<EventListener<SignalEventType>>
  >();

  on<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<SignalEventType>);
  }

  once<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends SignalEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<SignalEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends SignalEventType>(event: SignalEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      // Copy so listeners can unsubscribe while being notified.
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }

  listenerCount(eventType: SignalEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }
}
