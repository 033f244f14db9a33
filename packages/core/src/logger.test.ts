import { describe, it, expect } from "vitest";
import type { LogEntry } from "@collab/types";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  it("should drop entries below the configured level", () => {
    const entries: LogEntry[] = [];
    const logger = createLogger("locks", { level: "warn", sink: (e) => entries.push(e) });

    logger.debug("ignored");
    logger.info("ignored");
    logger.warn("contended", { resourceId: "f.py" });
    logger.error("failed");

    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ["warn", "contended"],
      ["error", "failed"],
    ]);
    expect(entries[0]).toMatchObject({ component: "locks", data: { resourceId: "f.py" } });
    expect(entries[1]).not.toHaveProperty("data");
  });
});
