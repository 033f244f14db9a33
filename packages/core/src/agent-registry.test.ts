import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SQLiteCoordinationStore } from "@collab/persistence";
import { SessionController } from "./session-controller.js";
import { createLogger } from "./logger.js";

describe("AgentRegistry", () => {
  let store: SQLiteCoordinationStore;
  let controller: SessionController;

  beforeEach(async () => {
    store = new SQLiteCoordinationStore(":memory:");
    controller = new SessionController({
      store,
      notifier: { send: async () => true },
      logger: createLogger("test", { sink: () => {} }),
    });
    await controller.createOrLoad("s1");
  });

  afterEach(() => {
    store.close();
  });

  describe("addAgent", () => {
    it("should add an idle agent and record the join", async () => {
      const agent = await controller.addAgent("s1", "FORGE", "planner");

      expect(agent).toMatchObject({
        sessionId: "s1",
        name: "FORGE",
        role: "planner",
        status: "idle",
        currentTask: null,
      });
      const [last] = await controller.getHistory("s1", 1);
      expect(last).toMatchObject({ agentName: "FORGE", action: "agent_joined", detail: "role: planner" });
    });

    it("should keep the initial task", async () => {
      const agent = await controller.addAgent("s1", "BOLT", "builder", "Implement parser");
      expect(agent.currentTask).toBe("Implement parser");
      expect(await controller.agents.getAgent("s1", "BOLT")).toEqual(agent);
    });

    it("should reject a name already in the session", async () => {
      await controller.addAgent("s1", "FORGE", "planner");
      await expect(controller.addAgent("s1", "FORGE", "tester")).rejects.toMatchObject({
        code: "DUPLICATE_AGENT",
      });
      expect(await controller.getAgents("s1")).toHaveLength(1);
    });

    it("should reject joins on an unknown session", async () => {
      await expect(controller.addAgent("nope", "FORGE", "planner")).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
      });
    });

    it("should reject joins on a terminal session", async () => {
      await controller.cancel("s1");
      await expect(controller.addAgent("s1", "FORGE", "planner")).rejects.toMatchObject({
        code: "SESSION_TERMINAL",
      });
    });
  });

  describe("removeAgent", () => {
    it("should release the agent's locks before recording the departure", async () => {
      await controller.addAgent("s1", "BOLT", "builder");
      await controller.addAgent("s1", "ATLAS", "tester");
      await controller.lockResource("s1", "a.py", "BOLT");
      await controller.lockResource("s1", "c.py", "ATLAS");
      await controller.lockResource("s1", "b.py", "BOLT", "task");

      const released = await controller.removeAgent("s1", "BOLT");

      expect(released.map((l) => l.resourceId)).toEqual(["a.py", "b.py"]);
      expect((await controller.getLocks("s1")).map((l) => l.resourceId)).toEqual(["c.py"]);
      expect(await controller.getAgents("s1")).toHaveLength(1);

      const tail = await controller.getHistory("s1", 3);
      expect(tail.map((e) => [e.agentName, e.action, e.detail])).toEqual([
        ["BOLT", "resource_unlocked", "unlocked a.py"],
        ["BOLT", "resource_unlocked", "unlocked b.py"],
        ["BOLT", "agent_left", "removed from session"],
      ]);
    });

    it("should fail for an absent agent", async () => {
      await expect(controller.removeAgent("s1", "GHOST")).rejects.toMatchObject({
        code: "AGENT_NOT_FOUND",
      });
    });
  });

  describe("updateStatus", () => {
    beforeEach(async () => {
      await controller.addAgent("s1", "BOLT", "builder", "Implement parser");
    });

    it("should change status and keep the task when none is given", async () => {
      const agent = await controller.updateStatus("s1", "BOLT", "waiting");
      expect(agent).toMatchObject({ status: "waiting", currentTask: "Implement parser" });

      const [last] = await controller.getHistory("s1", 1);
      expect(last.detail).toBe("status: waiting, task: Implement parser");
    });

    it("should clear the task on null", async () => {
      await controller.updateStatus("s1", "BOLT", "done", null);
      const stored = await controller.agents.getAgent("s1", "BOLT");
      expect(stored).toMatchObject({ status: "done", currentTask: null });

      const [last] = await controller.getHistory("s1", 1);
      expect(last.detail).toBe("status: done, task: none");
    });

    it("should reject an unknown status", async () => {
      const before = await controller.history.count("s1");
      await expect(controller.updateStatus("s1", "BOLT", "sleeping")).rejects.toMatchObject({
        code: "INVALID_STATUS",
      });
      expect(await controller.history.count("s1")).toBe(before);
    });

    it("should report a terminal session before checking the status value", async () => {
      await controller.complete("s1");
      await expect(controller.updateStatus("s1", "BOLT", "sleeping")).rejects.toMatchObject({
        code: "SESSION_TERMINAL",
      });
    });

    it("should reject an unknown agent", async () => {
      await expect(controller.updateStatus("s1", "GHOST", "active")).rejects.toMatchObject({
        code: "AGENT_NOT_FOUND",
      });
    });
  });

  describe("getAgentByRole", () => {
    it("should return the first agent to join in that role", async () => {
      await controller.addAgent("s1", "BOLT", "builder");
      await controller.addAgent("s1", "NOVA", "builder");

      const agent = await controller.getAgentByRole("s1", "builder");
      expect(agent?.name).toBe("BOLT");
    });

    it("should return undefined when nobody holds the role", async () => {
      expect(await controller.getAgentByRole("s1", "tester")).toBeUndefined();
    });
  });
});
