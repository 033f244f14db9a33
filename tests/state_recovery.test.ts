import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";

import { SessionController, createLogger } from "@collab/core";
import { SQLiteCoordinationStore } from "@collab/persistence";
import type { LogEntry } from "@collab/types";

describe("State Recovery (Restart Test)", () => {
  let dbPath: string;
  let tmpDir: string;
  let stores: SQLiteCoordinationStore[];

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "collab-restart-"));
    dbPath = path.join(tmpDir, "collab.db");
    stores = [];
  });

  afterEach(async () => {
    for (const store of stores) store.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  /** A coordinator process: its own connection, logger and controller. */
  function openCoordinator(logs: LogEntry[] = []) {
    const store = new SQLiteCoordinationStore(dbPath, { busyTimeoutMs: 2000 });
    stores.push(store);
    const controller = new SessionController({
      store,
      notifier: { send: async () => true },
      logger: createLogger("recovery", { level: "debug", sink: (entry) => logs.push(entry) }),
    });
    return { store, controller };
  }

  it("should restore the full session after a restart", async () => {
    const first = openCoordinator();
    await first.controller.createOrLoad("s1", { context: "Migrate schema", metadata: { sprint: 4 } });
    await first.controller.addAgent("s1", "BOLT", "builder", "write migration");
    await first.controller.lockResource("s1", "schema.sql", "BOLT");
    await first.controller.pause("s1");
    first.store.close();
    stores = [];

    const second = openCoordinator();
    const session = await second.controller.createOrLoad("s1");
    const snapshot = await second.controller.getStatus("s1");

    expect(session).toMatchObject({ id: "s1", status: "paused", context: "Migrate schema", metadata: { sprint: 4 } });
    expect(snapshot?.agents).toMatchObject([{ name: "BOLT", role: "builder", currentTask: "write migration" }]);
    expect(snapshot?.locks).toMatchObject([{ resourceId: "schema.sql", holder: "BOLT" }]);
    expect(snapshot?.historyCount).toBe(4);
  });

  it("should let exactly one of two coordinators take a contended lock", async () => {
    const a = openCoordinator();
    const b = openCoordinator();
    await a.controller.createOrLoad("s1");
    await a.controller.addAgent("s1", "BOLT", "builder");
    await b.controller.addAgent("s1", "ATLAS", "reviewer");

    const results = await Promise.all([
      a.controller.lockResource("s1", "f.py", "BOLT"),
      b.controller.lockResource("s1", "f.py", "ATLAS"),
    ]);

    expect(results.filter(Boolean)).toHaveLength(1);
    const locks = await b.controller.getLocks("s1");
    expect(locks).toHaveLength(1);
    expect(locks[0]?.holder).toBe(results[0] ? "BOLT" : "ATLAS");
  });

  it("should see another coordinator's release immediately", async () => {
    const a = openCoordinator();
    const b = openCoordinator();
    await a.controller.createOrLoad("s1");
    await a.controller.addAgent("s1", "BOLT", "builder");
    await a.controller.addAgent("s1", "ATLAS", "reviewer");
    await a.controller.lockResource("s1", "f.py", "BOLT");

    expect(await b.controller.lockResource("s1", "f.py", "ATLAS")).toBe(false);
    await a.controller.unlockResource("s1", "f.py", "BOLT");
    expect(await b.controller.lockResource("s1", "f.py", "ATLAS")).toBe(true);
  });

  it("should release a lock orphaned by an interrupted removal on load", async () => {
    const first = openCoordinator();
    await first.controller.createOrLoad("s1");
    await first.controller.addAgent("s1", "BOLT", "builder");
    await first.controller.lockResource("s1", "f.py", "BOLT");
    // Agent row gone, lock row left behind.
    await first.store.run((tx) => tx.deleteAgent("s1", "BOLT"));

    const logs: LogEntry[] = [];
    const second = openCoordinator(logs);
    await second.controller.createOrLoad("s1");

    expect(await second.controller.isLocked("s1", "f.py")).toBe(false);
    const history = await second.controller.getHistory("s1");
    expect(history.at(-1)).toMatchObject({
      action: "resource_unlocked",
      agentName: "BOLT",
      detail: "unlocked f.py (stale holder BOLT)",
    });
    expect(logs.find((entry) => entry.message === "Released stale locks")).toMatchObject({
      level: "warn",
      data: { sessionId: "s1", locks: [{ resourceId: "f.py", holder: "BOLT" }] },
    });
  });
});
