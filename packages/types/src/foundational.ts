/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;
export type EventId = Brand<string, "EventId">;

/**
 * Session identifiers and agent names are chosen by callers
 * ("build_feature_x", "BOLT"), so they stay plain strings.
 */
export type SessionId = string;
export type AgentName = string;

/** ISO 8601 timestamp. */
export type Timestamp = string;
