import type {
  CoordinationStore,
  Session,
  SessionStatus,
  StoreTransaction,
  TerminalSessionStatus,
  Timestamp,
  UnitOfWorkMode,
} from "@collab/types";
import { isCollabError, sessionNotFound, sessionTerminal, storeError } from "./errors.js";

/** Produces the timestamp stamped on every write. */
export type Clock = () => Timestamp;

export const systemClock: Clock = () => new Date().toISOString();

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  active: ["paused", "completed", "cancelled"],
  paused: ["active", "completed", "cancelled"],
  completed: [],
  cancelled: [],
};

export function isTerminal(status: SessionStatus): status is TerminalSessionStatus {
  return status === "completed" || status === "cancelled";
}

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function requireSession(tx: StoreTransaction, sessionId: string): Session {
  const session = tx.getSession(sessionId);
  if (!session) throw sessionNotFound(sessionId);
  return session;
}

/** Load a session that still accepts agent, lock and handoff mutations. */
export function requireMutableSession(tx: StoreTransaction, sessionId: string): Session {
  const session = requireSession(tx, sessionId);
  if (isTerminal(session.status)) throw sessionTerminal(sessionId, session.status);
  return session;
}

/**
 * Run one unit of work against the store.
 *
 * Domain errors raised by `work` roll the unit back and propagate as-is;
 * anything else the store throws surfaces as `STORE_ERROR`.
 */
export async function runUnit<T>(
  store: CoordinationStore,
  operation: string,
  work: (tx: StoreTransaction) => T,
  mode: UnitOfWorkMode = "write"
): Promise<T> {
  try {
    return await store.run(work, mode);
  } catch (err) {
    if (isCollabError(err)) throw err;
    throw storeError(operation, err);
  }
}
