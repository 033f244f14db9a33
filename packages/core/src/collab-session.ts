import type {
  Agent,
  CreateSessionOptions,
  HandoffResult,
  HistoryEntry,
  ResourceLock,
  Session,
  SessionSnapshot,
} from "@collab/types";
import type { SessionController } from "./session-controller.js";

/**
 * Session-bound view over a `SessionController`.
 *
 * ```ts
 * const session = await CollabSession.open(controller, "build_feature_x");
 * await session.addAgent("FORGE", "planner");
 * await session.addAgent("BOLT", "builder");
 * await session.lockResource("plan.md", "FORGE");
 * await session.unlockResource("plan.md");
 * await session.notifyNextRole("builder");
 * ```
 */
export class CollabSession {
  private constructor(
    private readonly controller: SessionController,
    readonly id: string
  ) {}

  static async open(
    controller: SessionController,
    sessionId: string,
    options?: CreateSessionOptions
  ): Promise<CollabSession> {
    await controller.createOrLoad(sessionId, options);
    return new CollabSession(controller, sessionId);
  }

  addAgent(name: string, role: string, initialTask?: string): Promise<Agent> {
    return this.controller.addAgent(this.id, name, role, initialTask);
  }

  removeAgent(name: string): Promise<ResourceLock[]> {
    return this.controller.removeAgent(this.id, name);
  }

  updateStatus(name: string, status: string, currentTask?: string | null): Promise<Agent> {
    return this.controller.updateStatus(this.id, name, status, currentTask);
  }

  lockResource(resourceId: string, agentName: string, resourceType?: string): Promise<boolean> {
    return this.controller.lockResource(this.id, resourceId, agentName, resourceType);
  }

  unlockResource(resourceId: string, agentName?: string): Promise<boolean> {
    return this.controller.unlockResource(this.id, resourceId, agentName);
  }

  notifyNextRole(role: string): Promise<HandoffResult> {
    return this.controller.notifyNextRole(this.id, role);
  }

  pause(): Promise<Session> {
    return this.controller.pause(this.id);
  }

  resume(): Promise<Session> {
    return this.controller.resume(this.id);
  }

  complete(): Promise<Session> {
    return this.controller.complete(this.id);
  }

  cancel(): Promise<Session> {
    return this.controller.cancel(this.id);
  }

  getStatus(): Promise<SessionSnapshot | undefined> {
    return this.controller.getStatus(this.id);
  }

  getAgents(): Promise<Agent[]> {
    return this.controller.getAgents(this.id);
  }

  getAgentByRole(role: string): Promise<Agent | undefined> {
    return this.controller.getAgentByRole(this.id, role);
  }

  getLocks(): Promise<ResourceLock[]> {
    return this.controller.getLocks(this.id);
  }

  isLocked(resourceId: string): Promise<boolean> {
    return this.controller.isLocked(this.id, resourceId);
  }

  getHistory(limit?: number): Promise<HistoryEntry[]> {
    return this.controller.getHistory(this.id, limit);
  }
}
