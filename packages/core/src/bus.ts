import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  CollabEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SpanId,
  TraceId,
} from "@collab/types";
import { createLogger, type Logger } from "./logger.js";

/**
 * In-memory implementation of the event bus.
 * Handlers run concurrently; a failing handler never affects the others.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<{
    filter: EventFilter;
    handler: EventHandler<unknown>;
    id: string;
  }>();

  constructor(private readonly logger: Logger = createLogger("bus")) {}

  async publish<T>(event: CollabEvent<T>): Promise<void> {
    const pending: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (!this.matches(event, sub.filter)) continue;
      try {
        const result = sub.handler(event);
        if (result instanceof Promise) {
          pending.push(result);
        }
      } catch (err) {
        this.reportHandlerError(event, sub.id, err);
      }
    }

    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        this.reportHandlerError(event, undefined, outcome.reason);
      }
    }
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    // Handlers only ever receive events that passed their own filter.
    const sub = { filter, handler: handler as EventHandler<unknown>, id };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  private matches(event: CollabEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.targetAgent && event.targetAgent !== filter.targetAgent) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }

  private reportHandlerError(event: CollabEvent, subscriptionId: string | undefined, err: unknown): void {
    this.logger.error("Event handler failed", {
      eventId: event.id,
      topic: event.topic,
      subscriptionId,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(
  topic: EventTopic,
  payload: T,
  traceCtx: TraceContext,
  targetAgent?: string
): CollabEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
    ...(targetAgent !== undefined ? { targetAgent } : {}),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
