import Database from "better-sqlite3";
import type {
  Agent,
  AgentStatus,
  CoordinationStore,
  HistoryAction,
  HistoryEntry,
  ResourceLock,
  Session,
  SessionStatus,
  StoreTransaction,
  Timestamp,
  UnitOfWorkMode,
} from "@collab/types";

export interface SQLiteStoreOptions {
  /** Milliseconds a writer waits for another connection. Default 5000. */
  busyTimeoutMs?: number;
}

/**
 * SQLite-backed implementation of `CoordinationStore`.
 *
 * Write units open with `BEGIN IMMEDIATE`, taking the database write lock
 * before the first read. Two connections racing for the same resource are
 * therefore serialized and exactly one sees it unlocked.
 */
export class SQLiteCoordinationStore implements CoordinationStore {
  private db: Database.Database;
  private tx: SQLiteTransaction;

  constructor(dbPath: string, options: SQLiteStoreOptions = {}) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
    this.migrate();
    this.tx = new SQLiteTransaction(this.db);
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        session_id  TEXT PRIMARY KEY,
        status      TEXT NOT NULL,
        created_at  TEXT NOT NULL,
        updated_at  TEXT NOT NULL,
        context     TEXT,
        metadata    TEXT NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_status
        ON sessions(status, created_at);

      CREATE TABLE IF NOT EXISTS session_agents (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id   TEXT NOT NULL,
        agent_name   TEXT NOT NULL,
        role         TEXT NOT NULL,
        status       TEXT NOT NULL,
        joined_at    TEXT NOT NULL,
        current_task TEXT,
        UNIQUE (session_id, agent_name),
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );

      CREATE TABLE IF NOT EXISTS resource_locks (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id    TEXT NOT NULL,
        resource_id   TEXT NOT NULL,
        locked_by     TEXT NOT NULL,
        locked_at     TEXT NOT NULL,
        resource_type TEXT NOT NULL,
        UNIQUE (session_id, resource_id),
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );

      CREATE TABLE IF NOT EXISTS session_history (
        session_id  TEXT NOT NULL,
        seq         INTEGER NOT NULL,
        timestamp   TEXT NOT NULL,
        agent_name  TEXT,
        action      TEXT NOT NULL,
        details     TEXT NOT NULL,
        PRIMARY KEY (session_id, seq),
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );
    `);
  }

  async run<T>(work: (tx: StoreTransaction) => T, mode: UnitOfWorkMode = "write"): Promise<T> {
    const unit = this.db.transaction(() => work(this.tx));
    return mode === "write" ? unit.immediate() : unit.deferred();
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}

/** Table access bound to the connection; only valid inside `run`. */
class SQLiteTransaction implements StoreTransaction {
  constructor(private readonly db: Database.Database) {}

  // ─── sessions ───────────────────────────────────────────────────

  getSession(sessionId: string): Session | undefined {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM sessions WHERE session_id = ?")
      .get(sessionId);
    return row ? toSession(row) : undefined;
  }

  insertSession(session: Session): void {
    this.db.prepare<[string, SessionStatus, string, string, string | null, string]>(`
      INSERT INTO sessions (session_id, status, created_at, updated_at, context, metadata)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      session.id,
      session.status,
      session.createdAt,
      session.updatedAt,
      session.context,
      JSON.stringify(session.metadata)
    );
  }

  updateSession(sessionId: string, patch: { status?: SessionStatus; updatedAt: Timestamp }): void {
    if (patch.status) {
      this.db
        .prepare<[SessionStatus, string, string]>(
          "UPDATE sessions SET status = ?, updated_at = ? WHERE session_id = ?"
        )
        .run(patch.status, patch.updatedAt, sessionId);
    } else {
      this.db
        .prepare<[string, string]>("UPDATE sessions SET updated_at = ? WHERE session_id = ?")
        .run(patch.updatedAt, sessionId);
    }
  }

  listSessions(status?: SessionStatus): Session[] {
    const rows = status
      ? this.db
          .prepare<[SessionStatus], SessionRow>(
            "SELECT * FROM sessions WHERE status = ? ORDER BY created_at DESC, rowid DESC"
          )
          .all(status)
      : this.db
          .prepare<[], SessionRow>("SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC")
          .all();
    return rows.map(toSession);
  }

  // ─── session_agents ─────────────────────────────────────────────

  getAgent(sessionId: string, name: string): Agent | undefined {
    const row = this.db
      .prepare<[string, string], AgentRow>(
        "SELECT * FROM session_agents WHERE session_id = ? AND agent_name = ?"
      )
      .get(sessionId, name);
    return row ? toAgent(row) : undefined;
  }

  listAgents(sessionId: string): Agent[] {
    return this.db
      .prepare<[string], AgentRow>("SELECT * FROM session_agents WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId)
      .map(toAgent);
  }

  findAgentByRole(sessionId: string, role: string): Agent | undefined {
    const row = this.db
      .prepare<[string, string], AgentRow>(
        "SELECT * FROM session_agents WHERE session_id = ? AND role = ? ORDER BY id ASC LIMIT 1"
      )
      .get(sessionId, role);
    return row ? toAgent(row) : undefined;
  }

  insertAgent(agent: Agent): void {
    this.db.prepare<[string, string, string, AgentStatus, string, string | null]>(`
      INSERT INTO session_agents (session_id, agent_name, role, status, joined_at, current_task)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(agent.sessionId, agent.name, agent.role, agent.status, agent.joinedAt, agent.currentTask);
  }

  updateAgent(
    sessionId: string,
    name: string,
    patch: { status: AgentStatus; currentTask: string | null }
  ): void {
    this.db
      .prepare<[AgentStatus, string | null, string, string]>(
        "UPDATE session_agents SET status = ?, current_task = ? WHERE session_id = ? AND agent_name = ?"
      )
      .run(patch.status, patch.currentTask, sessionId, name);
  }

  updateAllAgents(sessionId: string, status: AgentStatus): void {
    this.db
      .prepare<[AgentStatus, string]>("UPDATE session_agents SET status = ? WHERE session_id = ?")
      .run(status, sessionId);
  }

  deleteAgent(sessionId: string, name: string): boolean {
    const result = this.db
      .prepare<[string, string]>("DELETE FROM session_agents WHERE session_id = ? AND agent_name = ?")
      .run(sessionId, name);
    return result.changes > 0;
  }

  // ─── resource_locks ─────────────────────────────────────────────

  getLock(sessionId: string, resourceId: string): ResourceLock | undefined {
    const row = this.db
      .prepare<[string, string], LockRow>(
        "SELECT * FROM resource_locks WHERE session_id = ? AND resource_id = ?"
      )
      .get(sessionId, resourceId);
    return row ? toLock(row) : undefined;
  }

  listLocks(sessionId: string): ResourceLock[] {
    return this.db
      .prepare<[string], LockRow>("SELECT * FROM resource_locks WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId)
      .map(toLock);
  }

  insertLock(lock: ResourceLock): void {
    this.db.prepare<[string, string, string, string, string]>(`
      INSERT INTO resource_locks (session_id, resource_id, locked_by, locked_at, resource_type)
      VALUES (?, ?, ?, ?, ?)
    `).run(lock.sessionId, lock.resourceId, lock.holder, lock.acquiredAt, lock.resourceType);
  }

  deleteLock(sessionId: string, resourceId: string): boolean {
    const result = this.db
      .prepare<[string, string]>("DELETE FROM resource_locks WHERE session_id = ? AND resource_id = ?")
      .run(sessionId, resourceId);
    return result.changes > 0;
  }

  // ─── session_history ────────────────────────────────────────────

  appendHistory(entry: Omit<HistoryEntry, "seq">): number {
    const next = this.db
      .prepare<[string], { next: number }>(
        "SELECT COALESCE(MAX(seq), 0) + 1 AS next FROM session_history WHERE session_id = ?"
      )
      .get(entry.sessionId);
    const seq = next?.next ?? 1;

    this.db.prepare<[string, number, string, string | null, HistoryAction, string]>(`
      INSERT INTO session_history (session_id, seq, timestamp, agent_name, action, details)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(entry.sessionId, seq, entry.timestamp, entry.agentName, entry.action, entry.detail);
    return seq;
  }

  countHistory(sessionId: string): number {
    const row = this.db
      .prepare<[string], { cnt: number }>("SELECT COUNT(*) AS cnt FROM session_history WHERE session_id = ?")
      .get(sessionId);
    return row?.cnt ?? 0;
  }

  listHistory(sessionId: string, limit: number): HistoryEntry[] {
    return this.db
      .prepare<[string, number], HistoryRow>(`
        SELECT * FROM (
          SELECT * FROM session_history WHERE session_id = ? ORDER BY seq DESC LIMIT ?
        ) ORDER BY seq ASC
      `)
      .all(sessionId, limit)
      .map(toHistoryEntry);
  }
}

// ─── Internal row types ─────────────────────────────────────────────

interface SessionRow {
  session_id: string;
  status: SessionStatus;
  created_at: string;
  updated_at: string;
  context: string | null;
  metadata: string;
}

interface AgentRow {
  id: number;
  session_id: string;
  agent_name: string;
  role: string;
  status: AgentStatus;
  joined_at: string;
  current_task: string | null;
}

interface LockRow {
  id: number;
  session_id: string;
  resource_id: string;
  locked_by: string;
  locked_at: string;
  resource_type: string;
}

interface HistoryRow {
  session_id: string;
  seq: number;
  timestamp: string;
  agent_name: string | null;
  action: HistoryAction;
  details: string;
}

function toSession(row: SessionRow): Session {
  return {
    id: row.session_id,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    context: row.context,
    metadata: parseMetadata(row.metadata),
  };
}

function toAgent(row: AgentRow): Agent {
  return {
    sessionId: row.session_id,
    name: row.agent_name,
    role: row.role,
    status: row.status,
    joinedAt: row.joined_at,
    currentTask: row.current_task,
  };
}

function toLock(row: LockRow): ResourceLock {
  return {
    sessionId: row.session_id,
    resourceId: row.resource_id,
    holder: row.locked_by,
    resourceType: row.resource_type,
    acquiredAt: row.locked_at,
  };
}

function toHistoryEntry(row: HistoryRow): HistoryEntry {
  return {
    sessionId: row.session_id,
    seq: row.seq,
    timestamp: row.timestamp,
    agentName: row.agent_name,
    action: row.action,
    detail: row.details,
  };
}

function parseMetadata(raw: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw);
  return isRecord(value) ? value : {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
