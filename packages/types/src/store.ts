import type { AgentName, SessionId, Timestamp } from "./foundational.js";
import type {
  Agent,
  AgentStatus,
  HistoryEntry,
  ResourceLock,
  Session,
  SessionStatus,
} from "./session.js";

/**
 * Table-level operations available inside one unit of work.
 *
 * Methods are synchronous: the whole unit runs between BEGIN and COMMIT
 * with no interleaving from other callers.
 */
export interface StoreTransaction {
  // sessions
  getSession(sessionId: SessionId): Session | undefined;
  insertSession(session: Session): void;
  updateSession(
    sessionId: SessionId,
    patch: { status?: SessionStatus; updatedAt: Timestamp }
  ): void;
  /** Newest first. */
  listSessions(status?: SessionStatus): Session[];

  // session_agents (insertion order)
  getAgent(sessionId: SessionId, name: AgentName): Agent | undefined;
  listAgents(sessionId: SessionId): Agent[];
  findAgentByRole(sessionId: SessionId, role: string): Agent | undefined;
  insertAgent(agent: Agent): void;
  updateAgent(
    sessionId: SessionId,
    name: AgentName,
    patch: { status: AgentStatus; currentTask: string | null }
  ): void;
  updateAllAgents(sessionId: SessionId, status: AgentStatus): void;
  deleteAgent(sessionId: SessionId, name: AgentName): boolean;

  // resource_locks (insertion order)
  getLock(sessionId: SessionId, resourceId: string): ResourceLock | undefined;
  listLocks(sessionId: SessionId): ResourceLock[];
  insertLock(lock: ResourceLock): void;
  deleteLock(sessionId: SessionId, resourceId: string): boolean;

  // session_history (append-only)
  appendHistory(entry: Omit<HistoryEntry, "seq">): number;
  countHistory(sessionId: SessionId): number;
  /** The `limit` most recent entries, oldest first. */
  listHistory(sessionId: SessionId, limit: number): HistoryEntry[];
}

export type UnitOfWorkMode = "read" | "write";

/**
 * Durable store contract.
 *
 * `run` applies the unit atomically. If `work` throws, every write it made
 * is rolled back and the error propagates.
 */
export interface CoordinationStore {
  run<T>(work: (tx: StoreTransaction) => T, mode?: UnitOfWorkMode): Promise<T>;
  close(): void;
}
