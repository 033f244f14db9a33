import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SQLiteCoordinationStore } from "@collab/persistence";
import { SessionController } from "./session-controller.js";
import { createLogger } from "./logger.js";

describe("LockManager", () => {
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
    await controller.addAgent("s1", "BOLT", "builder");
    await controller.addAgent("s1", "ATLAS", "tester");
  });

  afterEach(() => {
    store.close();
  });

  /** Leave a lock behind for an agent that is not in the session. */
  async function plantOrphan(resourceId: string, holder: string): Promise<void> {
    await store.run((tx) =>
      tx.insertLock({
        sessionId: "s1",
        resourceId,
        holder,
        resourceType: "file",
        acquiredAt: "2026-01-19T10:00:00.000Z",
      })
    );
  }

  describe("acquire", () => {
    it("should lock a free resource", async () => {
      expect(await controller.lockResource("s1", "f.py", "BOLT")).toBe(true);

      const lock = await controller.locks.getLock("s1", "f.py");
      expect(lock).toMatchObject({ holder: "BOLT", resourceType: "file" });
      const [last] = await controller.getHistory("s1", 1);
      expect(last).toMatchObject({ agentName: "BOLT", action: "resource_locked", detail: "locked f.py (file)" });
    });

    it("should report contention as false without recording anything", async () => {
      await controller.lockResource("s1", "f.py", "BOLT");
      const before = await controller.history.count("s1");

      expect(await controller.lockResource("s1", "f.py", "ATLAS")).toBe(false);
      expect(await controller.history.count("s1")).toBe(before);
      expect((await controller.locks.getLock("s1", "f.py"))?.holder).toBe("BOLT");
    });

    it("should be idempotent for the current holder", async () => {
      expect(await controller.lockResource("s1", "f.py", "BOLT", "data")).toBe(true);
      expect(await controller.lockResource("s1", "f.py", "BOLT")).toBe(true);

      const locks = await controller.getLocks("s1");
      expect(locks).toHaveLength(1);
      expect(locks[0].resourceType).toBe("data");

      const locked = (await controller.getHistory("s1", 100)).filter((e) => e.action === "resource_locked");
      expect(locked.map((e) => e.detail)).toEqual(["locked f.py (data)", "locked f.py (data)"]);
    });

    it("should reject agents outside the session", async () => {
      await expect(controller.lockResource("s1", "f.py", "GHOST")).rejects.toMatchObject({
        code: "AGENT_NOT_FOUND",
      });
      expect(await controller.isLocked("s1", "f.py")).toBe(false);
    });

    it("should take over a lock whose holder has left", async () => {
      await plantOrphan("f.py", "GHOST");

      expect(await controller.lockResource("s1", "f.py", "ATLAS")).toBe(true);

      expect((await controller.locks.getLock("s1", "f.py"))?.holder).toBe("ATLAS");
      const tail = await controller.getHistory("s1", 2);
      expect(tail.map((e) => [e.agentName, e.action, e.detail])).toEqual([
        ["GHOST", "resource_unlocked", "unlocked f.py (stale holder GHOST)"],
        ["ATLAS", "resource_locked", "locked f.py (file)"],
      ]);
    });

    it("should list locks in acquisition order", async () => {
      await controller.lockResource("s1", "z.py", "BOLT");
      await controller.lockResource("s1", "a.py", "ATLAS");
      await controller.lockResource("s1", "m.py", "BOLT");

      expect((await controller.getLocks("s1")).map((l) => l.resourceId)).toEqual(["z.py", "a.py", "m.py"]);
    });
  });

  describe("release", () => {
    beforeEach(async () => {
      await controller.lockResource("s1", "f.py", "BOLT");
    });

    it("should not let another agent release the lock", async () => {
      expect(await controller.unlockResource("s1", "f.py", "ATLAS")).toBe(false);
      expect(await controller.isLocked("s1", "f.py")).toBe(true);
    });

    it("should release for the holder", async () => {
      expect(await controller.unlockResource("s1", "f.py", "BOLT")).toBe(true);
      expect(await controller.isLocked("s1", "f.py")).toBe(false);

      const [last] = await controller.getHistory("s1", 1);
      expect(last).toMatchObject({ agentName: "BOLT", action: "resource_unlocked", detail: "unlocked f.py" });
    });

    it("should release unconditionally without a name", async () => {
      expect(await controller.unlockResource("s1", "f.py")).toBe(true);
      expect(await controller.isLocked("s1", "f.py")).toBe(false);
    });

    it("should return false for a resource that is not locked", async () => {
      const before = await controller.history.count("s1");
      expect(await controller.unlockResource("s1", "other.py")).toBe(false);
      expect(await controller.history.count("s1")).toBe(before);
    });

    it("should reject releases on a terminal session", async () => {
      await controller.complete("s1");
      await expect(controller.unlockResource("s1", "f.py")).rejects.toMatchObject({
        code: "SESSION_TERMINAL",
      });
    });
  });

  describe("reconcile", () => {
    it("should release only locks held by absent agents", async () => {
      await controller.lockResource("s1", "kept.py", "BOLT");
      await plantOrphan("orphan.py", "GHOST");

      const stale = await controller.reconcile("s1");

      expect(stale.map((l) => l.resourceId)).toEqual(["orphan.py"]);
      expect((await controller.getLocks("s1")).map((l) => l.resourceId)).toEqual(["kept.py"]);
    });
  });
});
