export type { TraceId, SpanId, EventId, SessionId, AgentName, Timestamp } from "./foundational.js";
export type {
  SessionStatus,
  TerminalSessionStatus,
  AgentStatus,
  Session,
  Agent,
  ResourceLock,
  HistoryAction,
  HistoryEntry,
  SessionSnapshot,
  CreateSessionOptions,
} from "./session.js";
export type { StoreTransaction, CoordinationStore, UnitOfWorkMode } from "./store.js";
export type { NotifierMessage, Notifier, HandoffResult } from "./notifier.js";
export type {
  CollabEvent,
  EventTopic,
  EventFilter,
  EventHandler,
  Subscription,
  EventBus,
} from "./event-bus.js";
export type { TraceContext, LogLevel, LogEntry, LogSink } from "./observability.js";
export type { CollabErrorCode, CollabErrorInfo } from "./error.js";
export type { CoordinatorConfig } from "./config.js";
