import type {
  Agent,
  CoordinationStore,
  CoordinatorConfig,
  CreateSessionOptions,
  HandoffResult,
  HistoryAction,
  HistoryEntry,
  Notifier,
  NotifierMessage,
  ResourceLock,
  Session,
  SessionSnapshot,
  SessionStatus,
} from "@collab/types";
import { AgentRegistry } from "./agent-registry.js";
import { invalidTransition } from "./errors.js";
import { HistoryLog } from "./history-log.js";
import { LockManager } from "./lock-manager.js";
import { createLogger, type Logger } from "./logger.js";
import {
  canTransition,
  isTerminal,
  requireMutableSession,
  requireSession,
  runUnit,
  systemClock,
  type Clock,
} from "./session-state.js";

export interface SessionControllerOptions {
  store: CoordinationStore;
  notifier: Notifier;
  logger?: Logger;
  history?: CoordinatorConfig["history"];
  clock?: Clock;
}

const TRANSITION_ACTIONS: Record<SessionStatus, HistoryAction> = {
  active: "session_resumed",
  paused: "session_paused",
  completed: "session_completed",
  cancelled: "session_cancelled",
};

/**
 * Top-level entry point: session lifecycle, the command and query
 * surfaces, and role handoffs.
 *
 * Holds no session state between calls. Every operation reads what it
 * needs from the store and commits its writes as a single unit, so any
 * number of controllers may share one database.
 */
export class SessionController {
  readonly history: HistoryLog;
  readonly agents: AgentRegistry;
  readonly locks: LockManager;

  private readonly store: CoordinationStore;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly recentLimit: number;

  constructor(opts: SessionControllerOptions) {
    this.store = opts.store;
    this.notifier = opts.notifier;
    this.logger = opts.logger ?? createLogger("session");
    this.clock = opts.clock ?? systemClock;
    this.recentLimit = opts.history?.recentLimit ?? 5;

    const shared = { store: this.store, logger: this.logger, clock: this.clock };
    this.history = new HistoryLog({ ...shared, defaultLimit: opts.history?.defaultLimit });
    this.agents = new AgentRegistry({
      ...shared,
      history: this.history,
      locks: { releaseHeldBy: (tx, sessionId, holder) => this.locks.releaseHeldBy(tx, sessionId, holder) },
    });
    this.locks = new LockManager({ ...shared, history: this.history, registry: this.agents });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Return the session, creating it as `active` on first reference.
   * Loading an existing session sweeps locks left behind by departed agents.
   */
  async createOrLoad(sessionId: string, options: CreateSessionOptions = {}): Promise<Session> {
    const { session, created, stale } = await runUnit(this.store, "session.createOrLoad", (tx) => {
      const existing = tx.getSession(sessionId);
      if (existing) {
        const stale = isTerminal(existing.status) ? [] : this.locks.releaseStale(tx, sessionId);
        return { session: existing, created: false, stale };
      }

      const now = this.clock();
      const session: Session = {
        id: sessionId,
        status: "active",
        createdAt: now,
        updatedAt: now,
        context: options.context ?? null,
        metadata: options.metadata ?? {},
      };
      tx.insertSession(session);
      this.history.record(tx, sessionId, null, "session_created", "session initialized");
      return { session, created: true, stale: [] };
    });

    if (created) {
      this.logger.info("Session created", { sessionId });
    }
    this.reportStale(sessionId, stale);
    return session;
  }

  async pause(sessionId: string): Promise<Session> {
    return this.transition(sessionId, "paused");
  }

  async resume(sessionId: string): Promise<Session> {
    return this.transition(sessionId, "active");
  }

  /** Terminal. Releases every outstanding lock and marks all agents done. */
  async complete(sessionId: string): Promise<Session> {
    return this.transition(sessionId, "completed");
  }

  /** Terminal. Same cascade as `complete`. */
  async cancel(sessionId: string): Promise<Session> {
    return this.transition(sessionId, "cancelled");
  }

  /** Release locks whose holder has left the session. */
  async reconcile(sessionId: string): Promise<ResourceLock[]> {
    const stale = await runUnit(this.store, "session.reconcile", (tx) => {
      requireMutableSession(tx, sessionId);
      return this.locks.releaseStale(tx, sessionId);
    });
    this.reportStale(sessionId, stale);
    return stale;
  }

  // ─── Commands ───────────────────────────────────────────────────────

  addAgent(sessionId: string, name: string, role: string, initialTask?: string): Promise<Agent> {
    return this.agents.addAgent(sessionId, name, role, initialTask);
  }

  removeAgent(sessionId: string, name: string): Promise<ResourceLock[]> {
    return this.agents.removeAgent(sessionId, name);
  }

  updateStatus(
    sessionId: string,
    name: string,
    status: string,
    currentTask?: string | null
  ): Promise<Agent> {
    return this.agents.updateStatus(sessionId, name, status, currentTask);
  }

  lockResource(
    sessionId: string,
    resourceId: string,
    agentName: string,
    resourceType?: string
  ): Promise<boolean> {
    return this.locks.acquire(sessionId, resourceId, agentName, resourceType);
  }

  unlockResource(sessionId: string, resourceId: string, agentName?: string): Promise<boolean> {
    return this.locks.release(sessionId, resourceId, agentName);
  }

  /**
   * Hand the turn to whoever holds `role`.
   *
   * Without a holder nothing is sent; a `role_unresolved` entry is written
   * instead. A failed delivery is logged and leaves the committed state
   * in place.
   */
  async notifyNextRole(sessionId: string, role: string): Promise<HandoffResult> {
    const agent = await runUnit(this.store, "handoff.notify", (tx) => {
      requireMutableSession(tx, sessionId);
      const now = this.clock();
      const holder = tx.findAgentByRole(sessionId, role);
      if (!holder) {
        this.history.record(tx, sessionId, null, "role_unresolved", `no agent holds role ${role}`);
        tx.updateSession(sessionId, { updatedAt: now });
        return undefined;
      }

      const currentTask = `Ready to work on ${role} tasks`;
      tx.updateAgent(sessionId, holder.name, { status: "active", currentTask });
      this.history.record(tx, sessionId, null, "role_notified", `notified ${holder.name} (${role})`);
      tx.updateSession(sessionId, { updatedAt: now });
      return { ...holder, status: "active" as const, currentTask };
    });

    if (!agent) {
      this.logger.info("No agent holds role", { sessionId, role });
      return { delivered: false };
    }

    const delivered = await this.deliver({
      sessionId,
      target: agent.name,
      role,
      subject: `Your turn: ${role} in ${sessionId}`,
      body: [
        `Session: ${sessionId}`,
        `Role: ${role}`,
        "Status: active, ready to start work.",
        "",
        "Check session status for details.",
      ].join("\n"),
    });
    return { agent, delivered };
  }

  // ─── Queries ────────────────────────────────────────────────────────

  async getStatus(sessionId: string): Promise<SessionSnapshot | undefined> {
    return runUnit(
      this.store,
      "session.status",
      (tx) => {
        const session = tx.getSession(sessionId);
        if (!session) return undefined;
        return {
          session,
          agents: tx.listAgents(sessionId),
          locks: tx.listLocks(sessionId),
          historyCount: tx.countHistory(sessionId),
          recentHistory: this.recentLimit > 0 ? tx.listHistory(sessionId, this.recentLimit) : [],
        };
      },
      "read"
    );
  }

  async getSession(sessionId: string): Promise<Session | undefined> {
    return runUnit(this.store, "session.get", (tx) => tx.getSession(sessionId), "read");
  }

  /** Sessions known to the store, newest first. */
  async listSessions(filter: { status?: SessionStatus } = {}): Promise<Session[]> {
    return runUnit(this.store, "session.list", (tx) => tx.listSessions(filter.status), "read");
  }

  getAgents(sessionId: string): Promise<Agent[]> {
    return this.agents.getAgents(sessionId);
  }

  getAgentByRole(sessionId: string, role: string): Promise<Agent | undefined> {
    return this.agents.getAgentByRole(sessionId, role);
  }

  getLocks(sessionId: string): Promise<ResourceLock[]> {
    return this.locks.getLocks(sessionId);
  }

  isLocked(sessionId: string, resourceId: string): Promise<boolean> {
    return this.locks.isLocked(sessionId, resourceId);
  }

  getHistory(sessionId: string, limit?: number): Promise<HistoryEntry[]> {
    return this.history.query(sessionId, limit);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private async transition(sessionId: string, to: SessionStatus): Promise<Session> {
    const { session, released } = await runUnit(this.store, `session.${to}`, (tx) => {
      const current = requireSession(tx, sessionId);
      if (!canTransition(current.status, to)) {
        throw invalidTransition(sessionId, current.status, to);
      }

      const now = this.clock();
      let released: ResourceLock[] = [];
      if (isTerminal(to)) {
        released = this.locks.releaseAll(tx, sessionId);
        tx.updateAllAgents(sessionId, "done");
      }
      tx.updateSession(sessionId, { status: to, updatedAt: now });
      this.history.record(tx, sessionId, null, TRANSITION_ACTIONS[to], `session ${current.status} -> ${to}`);
      return { session: { ...current, status: to, updatedAt: now }, released };
    });

    this.logger.info("Session status changed", {
      sessionId,
      status: to,
      releasedLocks: released.map((l) => l.resourceId),
    });
    return session;
  }

  private async deliver(message: NotifierMessage): Promise<boolean> {
    try {
      const delivered = await this.notifier.send(message);
      if (!delivered) {
        this.logger.warn("Handoff notification not delivered", {
          sessionId: message.sessionId,
          target: message.target,
        });
      }
      return delivered;
    } catch (err) {
      this.logger.warn("Handoff notification failed", {
        sessionId: message.sessionId,
        target: message.target,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private reportStale(sessionId: string, stale: ResourceLock[]): void {
    if (stale.length === 0) return;
    this.logger.warn("Released stale locks", {
      sessionId,
      locks: stale.map((l) => ({ resourceId: l.resourceId, holder: l.holder })),
    });
  }
}
