import type { AgentName, SessionId, Timestamp } from "./foundational.js";

export type SessionStatus = "active" | "paused" | "completed" | "cancelled";

/** Statuses that accept no further mutation. */
export type TerminalSessionStatus = Extract<SessionStatus, "completed" | "cancelled">;

export type AgentStatus = "active" | "idle" | "waiting" | "done";

/**
 * A bounded collaboration context scoping agents, locks and history.
 *
 * Transitions only move toward a terminal status, except for the
 * active ↔ paused pair.
 */
export interface Session {
  readonly id: SessionId;
  readonly status: SessionStatus;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
  /** Free-form description of the shared task. */
  readonly context: string | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** A named participant, unique by name within its session. */
export interface Agent {
  readonly sessionId: SessionId;
  readonly name: AgentName;
  /** Not unique: several agents may share a role. */
  readonly role: string;
  readonly status: AgentStatus;
  readonly joinedAt: Timestamp;
  readonly currentTask: string | null;
}

/**
 * Exclusive claim on a resource identifier within a session.
 *
 * `holder` is a weak reference to an agent name. It is validated when the
 * lock is taken and may outlive the agent if a cascade was interrupted.
 */
export interface ResourceLock {
  readonly sessionId: SessionId;
  readonly resourceId: string;
  readonly holder: AgentName;
  /** Conventionally "file", "task" or "data". */
  readonly resourceType: string;
  readonly acquiredAt: Timestamp;
}

export type HistoryAction =
  | "session_created"
  | "session_paused"
  | "session_resumed"
  | "session_completed"
  | "session_cancelled"
  | "agent_joined"
  | "agent_left"
  | "status_updated"
  | "resource_locked"
  | "resource_unlocked"
  | "role_notified"
  | "role_unresolved";

/** One append-only audit record. `seq` starts at 1 and is never reused. */
export interface HistoryEntry {
  readonly sessionId: SessionId;
  readonly seq: number;
  readonly timestamp: Timestamp;
  /** Absent for system-generated entries. */
  readonly agentName: AgentName | null;
  readonly action: HistoryAction;
  readonly detail: string;
}

/** Read-only view returned by `getStatus`. */
export interface SessionSnapshot {
  readonly session: Session;
  readonly agents: Agent[];
  readonly locks: ResourceLock[];
  readonly historyCount: number;
  /** Latest entries, most recent last. */
  readonly recentHistory: HistoryEntry[];
}

export interface CreateSessionOptions {
  readonly context?: string;
  readonly metadata?: Record<string, unknown>;
}
