import type {
  CoordinationStore,
  HistoryAction,
  HistoryEntry,
  StoreTransaction,
} from "@collab/types";
import { requireMutableSession, runUnit, systemClock, type Clock } from "./session-state.js";

export interface HistoryLogOptions {
  store: CoordinationStore;
  clock?: Clock;
  /** Cap applied when `query` is called without a limit. */
  defaultLimit?: number;
}

/**
 * Append-only audit trail, one strictly increasing sequence per session.
 */
export class HistoryLog {
  private readonly store: CoordinationStore;
  private readonly clock: Clock;
  private readonly defaultLimit: number;

  constructor(opts: HistoryLogOptions) {
    this.store = opts.store;
    this.clock = opts.clock ?? systemClock;
    this.defaultLimit = opts.defaultLimit ?? 50;
  }

  /** Append inside the caller's unit of work. Returns the sequence number. */
  record(
    tx: StoreTransaction,
    sessionId: string,
    agentName: string | null,
    action: HistoryAction,
    detail: string
  ): number {
    return tx.appendHistory({
      sessionId,
      timestamp: this.clock(),
      agentName,
      action,
      detail,
    });
  }

  async append(
    sessionId: string,
    agentName: string | null,
    action: HistoryAction,
    detail: string
  ): Promise<number> {
    return runUnit(this.store, "history.append", (tx) => {
      requireMutableSession(tx, sessionId);
      return this.record(tx, sessionId, agentName, action, detail);
    });
  }

  /**
   * The `limit` most recent entries, most recent last. `Infinity` returns
   * the whole trail; `NaN` falls back to the default limit.
   */
  async query(sessionId: string, limit: number = this.defaultLimit): Promise<HistoryEntry[]> {
    const cap = this.toCap(Number.isNaN(limit) ? this.defaultLimit : limit);
    if (cap === 0) return [];
    return runUnit(this.store, "history.query", (tx) => tx.listHistory(sessionId, cap), "read");
  }

  async count(sessionId: string): Promise<number> {
    return runUnit(this.store, "history.count", (tx) => tx.countHistory(sessionId), "read");
  }

  /** SQLite reads a negative LIMIT as unbounded. */
  private toCap(limit: number): number {
    if (limit === Number.POSITIVE_INFINITY) return -1;
    return Math.max(0, Math.floor(limit));
  }
}
