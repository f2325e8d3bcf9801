/**
 * @module diagnostics/trace
 * @description Console tracing for signal lifecycle events.
 *
 * Signals never print on their own. `traceSignal()` subscribes to a
 * signal's monitor and writes one colored line per event.
 *
 * @example
 * ```ts
 * const stop = traceSignal(clicked, { label: "clicked" });
 * clicked.add(onClick);
 * // [14:02:11.408] [SLOT_ADDED] clicked: slot-1 added (once=false, priority=0), listeners=1
 * stop();
 * ```
 */

import { Chalk, type ChalkInstance } from "chalk";
import type { ISignalMonitor } from "../interfaces/event-emitter.js";
import type { SignalEvent, SignalEventType } from "../types/events.js";

export const ALL_SIGNAL_EVENTS: readonly SignalEventType[] = [
  "SLOT_ADDED",
  "SLOT_REMOVED",
  "SLOTS_CLEARED",
  "DISPATCHED",
  "DISPATCH_REJECTED",
];

export interface TraceOptions {
  /** Name printed on every line. Default: "signal" */
  label?: string;
  /** Colorize output. Default: true (subject to terminal support) */
  color?: boolean;
  /** Line sink. Default: console.log */
  write?: (line: string) => void;
  /** Event types to trace. Default: all */
  events?: readonly SignalEventType[];
}

export interface Traceable {
  readonly monitor: ISignalMonitor;
}

const TYPE_COLORS: Record<SignalEventType, (c: ChalkInstance) => ChalkInstance> = {
  SLOT_ADDED: (c) => c.green,
  SLOT_REMOVED: (c) => c.yellow,
  SLOTS_CLEARED: (c) => c.yellow.bold,
  DISPATCHED: (c) => c.cyan,
  DISPATCH_REJECTED: (c) => c.bgRed.white,
};

function describeEvent(event: SignalEvent): string {
  switch (event.type) {
    case "SLOT_ADDED":
      return `${event.slotId} added (once=${event.once}, priority=${event.priority}), listeners=${event.listenerCount}`;
    case "SLOT_REMOVED":
      return `${event.slotId} removed, listeners=${event.listenerCount}`;
    case "SLOTS_CLEARED":
      return `cleared ${event.removed} slots`;
    case "DISPATCHED":
      return `dispatched ${event.argCount} args, visited ${event.visited}, invoked ${event.invoked}`;
    case "DISPATCH_REJECTED":
      return `rejected ${event.error.code}: ${event.error.message}`;
  }
}

/**
 * Renders one event as a trace line (UTC wall-clock time).
 */
export function formatSignalEvent(
  event: SignalEvent,
  label: string,
  c: ChalkInstance = new Chalk({ level: 0 })
): string {
  const iso = new Date(event.timestamp).toISOString();
  const time = iso.slice(iso.indexOf("T") + 1, -1);
  const prefix = c.gray(`[${time}]`);
  const type = TYPE_COLORS[event.type](c)(`[${event.type}]`);
  return `${prefix} ${type} ${label}: ${describeEvent(event)}`;
}

/**
 * Writes a line for every lifecycle event of `signal`.
 *
 * @returns Unsubscribe function.
 */
export function traceSignal(signal: Traceable, options: TraceOptions = {}): () => void {
  const label = options.label ?? "signal";
  const write = options.write ?? ((line: string) => console.log(line));
  const events = options.events ?? ALL_SIGNAL_EVENTS;
  const c = options.color === false ? new Chalk({ level: 0 }) : new Chalk();

  const listener = (event: SignalEvent): void => {
    write(formatSignalEvent(event, label, c));
  };
  for (const type of events) {
    signal.monitor.on(type, listener);
  }

  return () => {
    for (const type of events) {
      signal.monitor.off(type, listener);
    }
  };
}
