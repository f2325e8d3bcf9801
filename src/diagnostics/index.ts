/**
 * @module diagnostics
 * @description Tracing helpers built on signal monitors.
 */

export {
  ALL_SIGNAL_EVENTS,
  formatSignalEvent,
  traceSignal,
} from "./trace.js";
export type { TraceOptions, Traceable } from "./trace.js";
