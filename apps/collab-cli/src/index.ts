#!/usr/bin/env node
import { SessionController, LogNotifier, createLogger, loadCoordinatorConfig } from "@collab/core";
import { SQLiteCoordinationStore } from "@collab/persistence";
import type { SessionStatus } from "@collab/types";
import { formatSessionList, formatSnapshot } from "./format.js";

const USAGE = `Usage:
  collab-status <session_id>        Show (creating if needed) a session
  collab-status --list [status]     List sessions, optionally by status

Config: collab.config.yaml (override with COLLAB_CONFIG)`;

const SESSION_STATUSES: readonly SessionStatus[] = ["active", "paused", "completed", "cancelled"];

function isSessionStatus(value: string): value is SessionStatus {
  return SESSION_STATUSES.some((s) => s === value);
}

const args = process.argv.slice(2);
if (args.length === 0) {
  console.log(USAGE);
  process.exit(0);
}

const config = await loadCoordinatorConfig(process.env.COLLAB_CONFIG ?? "collab.config.yaml");
const logger = createLogger("collab-cli", { level: config.log.level });
const store = new SQLiteCoordinationStore(config.database.path, {
  busyTimeoutMs: config.database.busyTimeoutMs,
});
const controller = new SessionController({
  store,
  notifier: new LogNotifier(logger),
  logger,
  history: config.history,
});

try {
  if (args[0] === "--list") {
    const status = args[1];
    if (status !== undefined && !isSessionStatus(status)) {
      console.error(`Unknown status "${status}" (expected one of: ${SESSION_STATUSES.join(", ")})`);
      process.exitCode = 1;
    } else {
      console.log(formatSessionList(await controller.listSessions({ status })));
    }
  } else {
    const sessionId = args[0];
    await controller.createOrLoad(sessionId);
    const snapshot = await controller.getStatus(sessionId);
    if (snapshot) console.log(formatSnapshot(snapshot));
  }
} finally {
  store.close();
}
