import { z } from "zod";
import type {
  Agent,
  AgentStatus,
  CoordinationStore,
  ResourceLock,
  StoreTransaction,
} from "@collab/types";
import { agentNotFound, duplicateAgent, invalidStatus } from "./errors.js";
import type { HistoryLog } from "./history-log.js";
import type { Logger } from "./logger.js";
import { requireMutableSession, runUnit, systemClock, type Clock } from "./session-state.js";

export const AGENT_STATUSES = ["active", "idle", "waiting", "done"] as const satisfies readonly AgentStatus[];

export const AgentStatusSchema = z.enum(AGENT_STATUSES);

/** Releases every lock a departing agent holds, inside the caller's unit. */
export interface LockReleaser {
  releaseHeldBy(tx: StoreTransaction, sessionId: string, holder: string): ResourceLock[];
}

export interface AgentRegistryOptions {
  store: CoordinationStore;
  history: HistoryLog;
  locks: LockReleaser;
  logger: Logger;
  clock?: Clock;
}

/**
 * Tracks agents in a session, their role and status.
 */
export class AgentRegistry {
  private readonly store: CoordinationStore;
  private readonly history: HistoryLog;
  private readonly locks: LockReleaser;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: AgentRegistryOptions) {
    this.store = opts.store;
    this.history = opts.history;
    this.locks = opts.locks;
    this.logger = opts.logger;
    this.clock = opts.clock ?? systemClock;
  }

  async addAgent(
    sessionId: string,
    name: string,
    role: string,
    initialTask?: string
  ): Promise<Agent> {
    const agent = await runUnit(this.store, "agent.add", (tx) => {
      requireMutableSession(tx, sessionId);
      if (tx.getAgent(sessionId, name)) throw duplicateAgent(sessionId, name);

      const now = this.clock();
      const agent: Agent = {
        sessionId,
        name,
        role,
        status: "idle",
        joinedAt: now,
        currentTask: initialTask ?? null,
      };
      tx.insertAgent(agent);
      this.history.record(tx, sessionId, name, "agent_joined", `role: ${role}`);
      tx.updateSession(sessionId, { updatedAt: now });
      return agent;
    });

    this.logger.info("Agent joined", { sessionId, agent: name, role });
    return agent;
  }

  /**
   * Remove an agent. Its locks are released first, each release recorded,
   * then the departure itself; all of it commits or none of it does.
   */
  async removeAgent(sessionId: string, name: string): Promise<ResourceLock[]> {
    const released = await runUnit(this.store, "agent.remove", (tx) => {
      requireMutableSession(tx, sessionId);
      this.requireIn(tx, sessionId, name);

      const released = this.locks.releaseHeldBy(tx, sessionId, name);
      this.history.record(tx, sessionId, name, "agent_left", "removed from session");
      tx.deleteAgent(sessionId, name);
      tx.updateSession(sessionId, { updatedAt: this.clock() });
      return released;
    });

    this.logger.info("Agent left", {
      sessionId,
      agent: name,
      releasedLocks: released.map((l) => l.resourceId),
    });
    return released;
  }

  /**
   * Set an agent's status. Omitting `currentTask` keeps the current one;
   * `null` clears it.
   */
  async updateStatus(
    sessionId: string,
    name: string,
    status: string,
    currentTask?: string | null
  ): Promise<Agent> {
    return runUnit(this.store, "agent.updateStatus", (tx) => {
      requireMutableSession(tx, sessionId);
      const parsed = AgentStatusSchema.safeParse(status);
      if (!parsed.success) throw invalidStatus(status, AGENT_STATUSES);
      const next = parsed.data;
      const agent = this.requireIn(tx, sessionId, name);
      const task = currentTask === undefined ? agent.currentTask : currentTask;

      tx.updateAgent(sessionId, name, { status: next, currentTask: task });
      this.history.record(
        tx,
        sessionId,
        name,
        "status_updated",
        `status: ${next}, task: ${task ?? "none"}`
      );
      tx.updateSession(sessionId, { updatedAt: this.clock() });
      return { ...agent, status: next, currentTask: task };
    });
  }

  async getAgents(sessionId: string): Promise<Agent[]> {
    return runUnit(this.store, "agent.list", (tx) => tx.listAgents(sessionId), "read");
  }

  async getAgent(sessionId: string, name: string): Promise<Agent | undefined> {
    return runUnit(this.store, "agent.get", (tx) => tx.getAgent(sessionId, name), "read");
  }

  /**
   * First agent holding `role`, by join order. Roles are not unique, so
   * later agents sharing the role are never returned here.
   */
  async getAgentByRole(sessionId: string, role: string): Promise<Agent | undefined> {
    return runUnit(this.store, "agent.byRole", (tx) => tx.findAgentByRole(sessionId, role), "read");
  }

  requireIn(tx: StoreTransaction, sessionId: string, name: string): Agent {
    const agent = tx.getAgent(sessionId, name);
    if (!agent) throw agentNotFound(sessionId, name);
    return agent;
  }

  isMemberIn(tx: StoreTransaction, sessionId: string, name: string): boolean {
    return tx.getAgent(sessionId, name) !== undefined;
  }
}
