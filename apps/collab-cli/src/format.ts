import type { Session, SessionSnapshot } from "@collab/types";

const RULE = "=".repeat(70);

/** Render a status snapshot as the human-readable report printed by the CLI. */
export function formatSnapshot(snapshot: SessionSnapshot): string {
  const { session, agents, locks, recentHistory } = snapshot;
  const lines: string[] = [
    RULE,
    `Session: ${session.id}`,
    RULE,
    `Status: ${session.status}`,
    `Created: ${session.createdAt}`,
  ];
  if (session.context) lines.push(`Context: ${session.context}`);

  lines.push("", `Agents (${agents.length}):`);
  for (const agent of agents) {
    const task = agent.currentTask ? ` | Task: ${agent.currentTask}` : "";
    lines.push(`  - ${agent.name.padEnd(12)} | Role: ${agent.role.padEnd(12)} | Status: ${agent.status}${task}`);
  }

  lines.push("", `Locks (${locks.length}):`);
  for (const lock of locks) {
    lines.push(`  - ${lock.resourceId.padEnd(20)} | Locked by: ${lock.holder} (${lock.resourceType})`);
  }

  lines.push("", `Recent History (${recentHistory.length} of ${snapshot.historyCount}):`);
  for (const entry of recentHistory) {
    const actor = (entry.agentName ?? "SYSTEM").padEnd(12);
    lines.push(`  #${entry.seq} [${entry.timestamp}] ${actor} | ${entry.action.padEnd(20)} | ${entry.detail}`);
  }

  lines.push(RULE);
  return lines.join("\n");
}

export function formatSessionList(sessions: Session[]): string {
  if (sessions.length === 0) return "No sessions.";
  return sessions
    .map((s) => `${s.id.padEnd(30)} ${s.status.padEnd(10)} ${s.createdAt}`)
    .join("\n");
}
