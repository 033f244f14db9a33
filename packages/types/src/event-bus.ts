import type { AgentName, EventId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";

/**
 * Every message flowing through the bus is a `CollabEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface CollabEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
  /** Target agent. Absent for broadcast events. */
  readonly targetAgent?: AgentName;
}

/**
 * Enumerated event topics.
 * A string union rather than a numeric enum for debuggability.
 */
export type EventTopic = "handoff.notify";

export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Only events targeted at this agent. */
  readonly targetAgent?: AgentName;
  readonly predicate?: (event: CollabEvent) => boolean;
}

export type EventHandler<T = unknown> = (event: CollabEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: CollabEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}
