import type { SpanId, Timestamp, TraceId } from "./foundational.js";

/**
 * Attached to every bus event.
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  readonly traceId: TraceId;
  readonly spanId: SpanId;
  /** Absent for root spans. */
  readonly parentSpanId?: SpanId;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured log entry emitted by any component. */
export interface LogEntry {
  readonly timestamp: Timestamp;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

/** Writes one rendered entry. Defaults to the console. */
export type LogSink = (entry: LogEntry) => void;
