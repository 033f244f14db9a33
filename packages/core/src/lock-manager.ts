import type {
  CoordinationStore,
  ResourceLock,
  StoreTransaction,
} from "@collab/types";
import type { AgentRegistry } from "./agent-registry.js";
import type { HistoryLog } from "./history-log.js";
import type { Logger } from "./logger.js";
import { requireMutableSession, runUnit, systemClock, type Clock } from "./session-state.js";

export interface LockManagerOptions {
  store: CoordinationStore;
  history: HistoryLog;
  registry: AgentRegistry;
  logger: Logger;
  clock?: Clock;
}

/**
 * Owns the resource → holder mapping for every session.
 *
 * Acquire never blocks: contention is reported as `false` so callers can
 * poll with their own backoff. A lock whose holder is no longer in the
 * session is stale and gives way to the next acquirer.
 */
export class LockManager {
  private readonly store: CoordinationStore;
  private readonly history: HistoryLog;
  private readonly registry: AgentRegistry;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: LockManagerOptions) {
    this.store = opts.store;
    this.history = opts.history;
    this.registry = opts.registry;
    this.logger = opts.logger;
    this.clock = opts.clock ?? systemClock;
  }

  async acquire(
    sessionId: string,
    resourceId: string,
    agentName: string,
    resourceType = "file"
  ): Promise<boolean> {
    const acquired = await runUnit(this.store, "lock.acquire", (tx) => {
      requireMutableSession(tx, sessionId);
      this.registry.requireIn(tx, sessionId, agentName);

      let held = tx.getLock(sessionId, resourceId);
      if (held && held.holder !== agentName) {
        if (this.registry.isMemberIn(tx, sessionId, held.holder)) return false;
        this.drop(tx, held, `unlocked ${resourceId} (stale holder ${held.holder})`);
        held = undefined;
      }

      const now = this.clock();
      if (!held) {
        held = { sessionId, resourceId, holder: agentName, resourceType, acquiredAt: now };
        tx.insertLock(held);
      }
      this.history.record(
        tx,
        sessionId,
        agentName,
        "resource_locked",
        `locked ${resourceId} (${held.resourceType})`
      );
      tx.updateSession(sessionId, { updatedAt: now });
      return true;
    });

    this.logger.debug(acquired ? "Lock acquired" : "Lock contended", {
      sessionId,
      resourceId,
      agent: agentName,
    });
    return acquired;
  }

  /**
   * Release a lock. With `agentName` the release only happens when that
   * agent is the holder; a mismatch returns false and changes nothing.
   */
  async release(sessionId: string, resourceId: string, agentName?: string): Promise<boolean> {
    return runUnit(this.store, "lock.release", (tx) => {
      requireMutableSession(tx, sessionId);
      const lock = tx.getLock(sessionId, resourceId);
      if (!lock) return false;
      if (agentName !== undefined && lock.holder !== agentName) return false;

      this.drop(tx, lock);
      tx.updateSession(sessionId, { updatedAt: this.clock() });
      return true;
    });
  }

  async isLocked(sessionId: string, resourceId: string): Promise<boolean> {
    const lock = await this.getLock(sessionId, resourceId);
    return lock !== undefined;
  }

  async getLock(sessionId: string, resourceId: string): Promise<ResourceLock | undefined> {
    return runUnit(this.store, "lock.get", (tx) => tx.getLock(sessionId, resourceId), "read");
  }

  /** Current locks in acquisition order. */
  async getLocks(sessionId: string): Promise<ResourceLock[]> {
    return runUnit(this.store, "lock.list", (tx) => tx.listLocks(sessionId), "read");
  }

  // ─── Cascades (run inside the caller's unit) ─────────────────────

  releaseHeldBy(tx: StoreTransaction, sessionId: string, holder: string): ResourceLock[] {
    const held = tx.listLocks(sessionId).filter((lock) => lock.holder === holder);
    for (const lock of held) this.drop(tx, lock);
    return held;
  }

  releaseAll(tx: StoreTransaction, sessionId: string): ResourceLock[] {
    const all = tx.listLocks(sessionId);
    for (const lock of all) this.drop(tx, lock);
    return all;
  }

  /** Release locks whose holder is absent from the agent registry. */
  releaseStale(tx: StoreTransaction, sessionId: string): ResourceLock[] {
    const stale = tx
      .listLocks(sessionId)
      .filter((lock) => !this.registry.isMemberIn(tx, sessionId, lock.holder));
    for (const lock of stale) {
      this.drop(tx, lock, `unlocked ${lock.resourceId} (stale holder ${lock.holder})`);
    }
    return stale;
  }

  private drop(tx: StoreTransaction, lock: ResourceLock, detail = `unlocked ${lock.resourceId}`): void {
    tx.deleteLock(lock.sessionId, lock.resourceId);
    this.history.record(tx, lock.sessionId, lock.holder, "resource_unlocked", detail);
  }
}
