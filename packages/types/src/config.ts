import type { LogLevel } from "./observability.js";

export interface CoordinatorConfig {
  readonly database: {
    /** SQLite file path, or ":memory:". */
    readonly path: string;
    /** How long a writer waits for another connection's transaction. */
    readonly busyTimeoutMs: number;
  };
  readonly history: {
    /** Default `limit` for history queries. */
    readonly defaultLimit: number;
    /** Entries included in a status snapshot. */
    readonly recentLimit: number;
  };
  readonly log: {
    readonly level: LogLevel;
  };
}
